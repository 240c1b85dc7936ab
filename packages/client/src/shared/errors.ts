import type { Route } from '../http/route.js';

export const ERROR_CODES = {
  HTTP_ERROR: 'HTTP_ERROR',
  CONTENT_TYPE_MISMATCH: 'CONTENT_TYPE_MISMATCH',
  PROTOCOL_VIOLATION: 'PROTOCOL_VIOLATION',
  INVALID_CONFIG: 'INVALID_CONFIG',
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

export const ERROR_MESSAGES: Record<ErrorCode, string> = {
  HTTP_ERROR: 'Helix request failed',
  CONTENT_TYPE_MISMATCH: 'Expected JSON data, but received text data',
  PROTOCOL_VIOLATION: 'Helix response did not match the expected shape',
  INVALID_CONFIG: 'Invalid client configuration',
};

export class HelixError extends Error {
  public readonly errorCode: ErrorCode;
  public readonly details?: unknown;

  constructor(params: { errorCode: ErrorCode; message?: string; details?: unknown }) {
    super(params.message || ERROR_MESSAGES[params.errorCode]);
    this.name = 'HelixError';
    this.errorCode = params.errorCode;
    this.details = params.details;
  }
}

/** Raised for any response with status >= 400. `body` is parsed JSON when the server declared JSON. */
export class HelixHttpError extends HelixError {
  public readonly status: number;
  public readonly route: Route;
  public readonly body: unknown;

  constructor(params: { route: Route; status: number; body: unknown }) {
    const rendered = typeof params.body === 'string' ? params.body : JSON.stringify(params.body);
    super({
      errorCode: ERROR_CODES.HTTP_ERROR,
      message: `Request ${params.route.describe()} failed with status ${params.status}: ${rendered}`,
      details: params.body,
    });
    this.name = 'HelixHttpError';
    this.status = params.status;
    this.route = params.route;
    this.body = params.body;
  }
}

/** Raised when an asset (box art, thumbnails) answers anything but 200. */
export class HelixAssetError extends HelixError {
  public readonly status: number;
  public readonly url: string;
  public readonly body: string;

  constructor(params: { url: string; status: number; body: string; head?: boolean }) {
    const action = params.head ? 'request headers for' : 'get';
    super({
      errorCode: ERROR_CODES.HTTP_ERROR,
      message: `Failed to ${action} asset at "${params.url}" with status ${params.status}.`,
      details: params.body,
    });
    this.name = 'HelixAssetError';
    this.status = params.status;
    this.url = params.url;
    this.body = params.body;
  }
}

export class HelixContentTypeError extends HelixError {
  public readonly route: Route;
  public readonly body: string;

  constructor(params: { route: Route; body: string }) {
    super({ errorCode: ERROR_CODES.CONTENT_TYPE_MISMATCH, details: { url: params.route.url } });
    this.name = 'HelixContentTypeError';
    this.route = params.route;
    this.body = params.body;
  }
}

export class HelixProtocolError extends HelixError {
  constructor(message: string, details?: unknown) {
    super({ errorCode: ERROR_CODES.PROTOCOL_VIOLATION, message, details });
    this.name = 'HelixProtocolError';
  }
}

export class HelixConfigError extends HelixError {
  constructor(message: string, details?: unknown) {
    super({ errorCode: ERROR_CODES.INVALID_CONFIG, message, details });
    this.name = 'HelixConfigError';
  }
}

export function isHelixHttpError(error: unknown): error is HelixHttpError {
  return error instanceof HelixHttpError;
}
