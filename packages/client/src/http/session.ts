import type { HttpMethod } from '@helix-sdk/contracts';
import { DEFAULT_HTTP_TIMEOUT_MS, fetchWithTimeout } from './httpTimeouts.js';
import { logger as defaultLogger, type Logger } from '../utils/logger.js';

export type SessionRequest = {
  method: HttpMethod | 'HEAD';
  url: string;
  headers?: Record<string, string>;
  json?: unknown;
};

/**
 * Pooled transport shared by every route an `HttpClient` issues. Any object
 * with this shape can be handed to the client instead of the fetch-backed
 * default.
 */
export interface HttpSession {
  readonly closed: boolean;
  readonly headers: Record<string, string>;
  updateHeaders(headers: Record<string, string>): void;
  request(req: SessionRequest): Promise<Response>;
  close(): Promise<void>;
}

export type FetchSessionOptions = {
  headers?: Record<string, string>;
  timeoutMs?: number;
  logger?: Logger;
};

export class FetchSession implements HttpSession {
  private readonly timeoutMs: number;
  private readonly logger: Logger;
  private readonly inFlight = new Set<AbortController>();
  private defaultHeaders: Record<string, string>;
  private isClosed = false;

  constructor(options: FetchSessionOptions = {}) {
    this.defaultHeaders = { ...(options.headers ?? {}) };
    this.timeoutMs = options.timeoutMs ?? DEFAULT_HTTP_TIMEOUT_MS;
    this.logger = options.logger ?? defaultLogger;
  }

  get closed(): boolean {
    return this.isClosed;
  }

  get headers(): Record<string, string> {
    return { ...this.defaultHeaders };
  }

  updateHeaders(headers: Record<string, string>): void {
    this.defaultHeaders = { ...this.defaultHeaders, ...headers };
  }

  async request(req: SessionRequest): Promise<Response> {
    if (this.isClosed) {
      throw new Error('Session is closed');
    }

    const headers: Record<string, string> = { ...this.defaultHeaders, ...(req.headers ?? {}) };
    const init: RequestInit = { method: req.method, headers };
    if (req.json !== undefined) {
      headers['Content-Type'] = 'application/json';
      init.body = JSON.stringify(req.json);
    }

    return fetchWithTimeout({
      url: req.url,
      init,
      timeoutMs: this.timeoutMs,
      logger: this.logger,
      onController: (controller) => {
        this.inFlight.add(controller);
        return () => this.inFlight.delete(controller);
      },
    });
  }

  /** Aborts requests still in flight; subsequent requests are rejected. */
  async close(): Promise<void> {
    if (this.isClosed) return;
    this.isClosed = true;
    for (const controller of this.inFlight) {
      controller.abort(new Error('session_closed'));
    }
    this.inFlight.clear();
  }
}
