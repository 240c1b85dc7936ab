import { loadClientConfig } from './config/env.js';
import { HttpClient, type HttpClientOptions } from './http/httpClient.js';

export { loadClientConfig, validateEnv, type ClientConfig, type ClientEnv } from './config/env.js';
export { loadEnvFile } from './config/loadEnv.js';
export { HelixApi } from './helix/helixApi.js';
export type { BitsLeaderboardQuery, ChannelInfoUpdate, ClipQuery, StreamQuery, VideoQuery } from './helix/helixApi.js';
export { quote, quotePlus, unquote, unquotePlus, encodeParamValue } from './http/encoding.js';
export { HttpClient, jsonOrText } from './http/httpClient.js';
export { DEFAULT_ASSET_CHUNK_SIZE } from './http/httpClient.js';
export type { AssetOptions, AuthorizeHook, HttpClientOptions, PaginateOptions } from './http/httpClient.js';
export { DEFAULT_HTTP_TIMEOUT_MS, fetchWithTimeout, resolveHttpTimeoutMs } from './http/httpTimeouts.js';
export { HelixPaginator } from './http/paginator.js';
export type { Converter, Cursor, JsonRequester, PaginatorOptions } from './http/paginator.js';
export { HELIX_BASE_URL, ID_BASE_URL, Route, buildRouteUrl, trimPath } from './http/route.js';
export type { BuiltUrl, RouteBuildOptions, RouteInit } from './http/route.js';
export { FetchSession } from './http/session.js';
export type { FetchSessionOptions, HttpSession, SessionRequest } from './http/session.js';
export * from './models/index.js';
export {
  ERROR_CODES,
  ERROR_MESSAGES,
  HelixAssetError,
  HelixConfigError,
  HelixContentTypeError,
  HelixError,
  HelixHttpError,
  HelixProtocolError,
  isHelixHttpError,
} from './shared/errors.js';
export type { ErrorCode } from './shared/errors.js';
export { extractHttpStatus } from './utils/httpErrors.js';
export { formatLogLine, logger } from './utils/logger.js';
export type { LogLevel, LogMeta, Logger } from './utils/logger.js';
export { SDK_VERSION } from './version.js';

/** Build a client from `TWITCH_CLIENT_ID` and friends; throws `HelixConfigError` on bad env. */
export function createHttpClientFromEnv(
  source: NodeJS.ProcessEnv = process.env,
  overrides: Omit<HttpClientOptions, 'clientId'> = {}
): HttpClient {
  const config = loadClientConfig(source);
  return new HttpClient({
    clientId: config.clientId,
    userAgent: config.userAgent,
    timeoutMs: config.timeoutMs,
    ...overrides,
  });
}
