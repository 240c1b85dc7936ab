import type { Route } from './route.js';
import { FetchSession, type HttpSession } from './session.js';
import { HelixPaginator, type Converter, type JsonRequester } from './paginator.js';
import { DEFAULT_HTTP_TIMEOUT_MS } from './httpTimeouts.js';
import { HelixAssetError, HelixContentTypeError, HelixHttpError, HelixProtocolError } from '../shared/errors.js';
import { describeError } from '../utils/httpErrors.js';
import { clampInt } from '../utils/parsing.js';
import { logger as defaultLogger, type Logger } from '../utils/logger.js';
import { defaultUserAgent } from '../version.js';

/** Host hook that turns `route.tokenFor` into auth headers. */
export type AuthorizeHook = (route: Route) => Record<string, string> | Promise<Record<string, string>>;

export type HttpClientOptions = {
  clientId: string;
  session?: HttpSession | null;
  userAgent?: string;
  timeoutMs?: number;
  authorize?: AuthorizeHook;
  logger?: Logger;
};

export type PaginateOptions = {
  maxResults?: number | null;
};

export type AssetOptions = {
  /** Bytes per yielded chunk; the last chunk may be shorter. */
  chunkSize?: number;
};

export const DEFAULT_ASSET_CHUNK_SIZE = 1024;

const identity = (raw: unknown): unknown => raw;

export async function jsonOrText(response: Response): Promise<unknown> {
  const text = await response.text();
  const contentType = response.headers.get('Content-Type') ?? '';
  if (!contentType.startsWith('application/json')) return text;

  try {
    return JSON.parse(text);
  } catch {
    throw new HelixProtocolError('Response declared JSON but the body could not be parsed', {
      status: response.status,
      body: text,
    });
  }
}

export class HttpClient implements JsonRequester {
  public readonly userAgent: string;
  private readonly clientId: string;
  private readonly timeoutMs: number;
  private readonly authorize?: AuthorizeHook;
  private readonly logger: Logger;
  // Created on first request; replaced only after it was closed and cleared.
  private session: HttpSession | null;
  private sessionReady = false;

  constructor(options: HttpClientOptions) {
    this.clientId = options.clientId;
    this.userAgent = options.userAgent ?? defaultUserAgent();
    this.timeoutMs = options.timeoutMs ?? DEFAULT_HTTP_TIMEOUT_MS;
    this.authorize = options.authorize;
    this.logger = options.logger ?? defaultLogger;
    this.session = options.session ?? null;
  }

  get headers(): Record<string, string> {
    return { 'User-Agent': this.userAgent, 'Client-ID': this.clientId };
  }

  get hasOpenSession(): boolean {
    return this.session !== null && !this.session.closed;
  }

  private ensureSession(): HttpSession {
    if (this.session && !this.session.closed && this.sessionReady) {
      return this.session;
    }

    this.logger.debug('helix.session.init', { client: 'HttpClient' });

    const session =
      this.session && !this.session.closed
        ? this.session
        : new FetchSession({ timeoutMs: this.timeoutMs, logger: this.logger });
    session.updateHeaders(this.headers);

    this.session = session;
    this.sessionReady = true;
    return session;
  }

  /** Forget a session that was closed from outside; the next request opens a new one. */
  clear(): void {
    if (this.session && this.session.closed) {
      this.logger.debug('helix.session.cleared', { client: 'HttpClient' });
      this.session = null;
      this.sessionReady = false;
    }
  }

  async close(): Promise<void> {
    if (!this.session || this.session.closed) return;

    try {
      await this.session.close();
    } catch (error) {
      this.logger.debug('helix.session.close_failed', { client: 'HttpClient', ...describeError(error) });
    }

    this.clear();
    this.logger.debug('helix.session.closed', { client: 'HttpClient' });
  }

  async request(route: Route): Promise<unknown> {
    const session = this.ensureSession();

    this.logger.debug('helix.request', { route: route.describe() });

    const authHeaders = this.authorize ? await this.authorize(route) : {};
    const response = await session.request({
      method: route.method,
      url: route.url,
      headers: { ...route.headers, ...authHeaders },
      json: Object.keys(route.json).length > 0 ? route.json : undefined,
    });

    const data = await jsonOrText(response);
    if (response.status >= 400) {
      throw new HelixHttpError({ route, status: response.status, body: data });
    }
    return data;
  }

  async requestJson(route: Route): Promise<unknown> {
    const data = await this.request(route);
    if (typeof data === 'string') {
      throw new HelixContentTypeError({ route, body: data });
    }
    return data;
  }

  /** HEAD an asset url; resolves to its response headers (lower-cased keys). */
  async requestAssetHead(url: string): Promise<Record<string, string>> {
    const session = this.ensureSession();
    this.logger.debug('helix.asset.head', { url });

    const response = await session.request({ method: 'HEAD', url });
    if (response.status !== 200) {
      throw new HelixAssetError({ url, status: response.status, body: await response.text(), head: true });
    }

    const headers: Record<string, string> = {};
    response.headers.forEach((value, key) => {
      headers[key] = value;
    });
    return headers;
  }

  /**
   * Stream an asset body in fixed-size chunks. Nothing is requested until the
   * first chunk is pulled.
   */
  async *requestAsset(url: string, options: AssetOptions = {}): AsyncGenerator<Uint8Array, void, undefined> {
    const chunkSize = clampInt(options.chunkSize ?? DEFAULT_ASSET_CHUNK_SIZE, 1, Number.MAX_SAFE_INTEGER, DEFAULT_ASSET_CHUNK_SIZE);
    const session = this.ensureSession();
    this.logger.debug('helix.asset.get', { url, chunkSize });

    const response = await session.request({ method: 'GET', url });
    if (response.status !== 200) {
      throw new HelixAssetError({ url, status: response.status, body: await response.text() });
    }
    if (!response.body) return;

    const reader = response.body.getReader();
    let pending = new Uint8Array(0);
    let finished = false;
    try {
      for (;;) {
        const { done, value } = await reader.read();
        if (done) break;

        const merged = new Uint8Array(pending.length + value.length);
        merged.set(pending);
        merged.set(value, pending.length);
        pending = merged;

        while (pending.length >= chunkSize) {
          yield pending.slice(0, chunkSize);
          pending = pending.slice(chunkSize);
        }
      }
      finished = true;
      if (pending.length > 0) yield pending;
    } finally {
      // Consumer stopped early: drop the rest of the body.
      if (!finished) await reader.cancel();
      reader.releaseLock();
    }
  }

  requestPaginated(route: Route, options?: PaginateOptions): HelixPaginator<unknown>;
  requestPaginated<T>(route: Route, options: PaginateOptions & { converter: Converter<T> }): HelixPaginator<T>;
  requestPaginated<T>(
    route: Route,
    options: PaginateOptions & { converter?: Converter<T> } = {}
  ): HelixPaginator<T> | HelixPaginator<unknown> {
    if (options.converter) {
      return new HelixPaginator<T>(this, route, { maxResults: options.maxResults, converter: options.converter });
    }
    return new HelixPaginator<unknown>(this, route, { maxResults: options.maxResults, converter: identity });
  }
}
