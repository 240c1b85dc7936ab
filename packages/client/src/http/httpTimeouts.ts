import { clampInt } from '../utils/parsing.js';
import { isTimeoutError } from '../utils/httpErrors.js';
import { logger as defaultLogger, type Logger } from '../utils/logger.js';

export const DEFAULT_HTTP_TIMEOUT_MS = 10_000;

export function resolveHttpTimeoutMs(raw: unknown, fallbackMs = DEFAULT_HTTP_TIMEOUT_MS, minMs = 1000, maxMs = 120_000): number {
  return clampInt(Number.parseInt(String(raw ?? ''), 10), minMs, maxMs, fallbackMs);
}

export function createTimeoutSignal(
  timeoutMs: number,
  reason = 'helix_timeout'
): { controller: AbortController; clear: () => void } {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(new Error(reason)), timeoutMs);
  return {
    controller,
    clear: () => clearTimeout(timeout),
  };
}

export async function fetchWithTimeout(params: {
  url: string;
  init?: RequestInit;
  timeoutMs: number;
  timeoutReason?: string;
  onController?: (controller: AbortController) => () => void;
  logger?: Logger;
}): Promise<Response> {
  const log = params.logger ?? defaultLogger;
  const { controller, clear } = createTimeoutSignal(params.timeoutMs, params.timeoutReason);
  const release = params.onController?.(controller);
  try {
    return await fetch(params.url, { ...params.init, signal: controller.signal });
  } catch (error) {
    if (isTimeoutError(error)) {
      log.warn('helix.http.timeout', { url: params.url, timeoutMs: params.timeoutMs });
    }
    throw error;
  } finally {
    clear();
    release?.();
  }
}
