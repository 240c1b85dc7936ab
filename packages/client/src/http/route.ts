import type { HttpMethod, ParamMapping, ParamValue } from '@helix-sdk/contracts';
import { encodeParamValue } from './encoding.js';

export const HELIX_BASE_URL = 'https://api.twitch.tv/helix/';
export const ID_BASE_URL = 'https://id.twitch.tv/';

export type RouteBuildOptions = {
  /** Drop null/undefined params from the stored mapping (they are never emitted either way). */
  removeNone?: boolean;
  /** Repeat `key=v` per list element; otherwise join the elements with a literal `+`. */
  duplicateKey?: boolean;
};

export type RouteInit = RouteBuildOptions & {
  params?: ParamMapping;
  json?: Record<string, unknown>;
  headers?: Record<string, string>;
  /** Target the identity host instead of Helix. */
  useId?: boolean;
  /** Identity the host's auth layer uses to pick a bearer token. */
  tokenFor?: string | number | null;
};

export type BuiltUrl = {
  baseUrl: string;
  url: string;
  params: ParamMapping;
};

function isList(value: ParamValue): value is readonly (string | number | boolean)[] {
  return Array.isArray(value);
}

export function trimPath(path: string): string {
  return path.replace(/^\/+/, '').replace(/\/+$/, '');
}

/**
 * Pure URL construction. Returns the mapping that remains after null removal
 * alongside the URL so callers can keep both in sync.
 */
export function buildRouteUrl(
  input: { path: string; params: ParamMapping; useId: boolean },
  opts: RouteBuildOptions = {}
): BuiltUrl {
  const removeNone = opts.removeNone ?? true;
  const duplicateKey = opts.duplicateKey ?? true;

  const base = input.useId ? ID_BASE_URL : HELIX_BASE_URL;
  const baseUrl = `${base}${trimPath(input.path)}`;
  const params: ParamMapping = { ...input.params };

  const keys = Object.keys(params);
  if (keys.length === 0) {
    return { baseUrl, url: baseUrl, params };
  }

  let url = `${baseUrl}?`;
  for (const key of keys) {
    const value = params[key];
    if (value === null || value === undefined) {
      if (removeNone) delete params[key];
      continue;
    }

    if (!isList(value)) {
      url += `${key}=${encodeParamValue(String(value), { safe: '+', plus: true })}&`;
    } else if (duplicateKey) {
      for (const item of value) {
        url += `${key}=${encodeParamValue(String(item), { safe: '+', plus: true })}&`;
      }
    } else {
      const joined = value.map((item) => encodeParamValue(String(item), { safe: '+' })).join('+');
      url += `${key}=${joined}&`;
    }
  }

  return { baseUrl, url: url.replace(/&+$/, ''), params };
}

/**
 * One Helix call: method, path, query and body. Routes are immutable; every
 * parameter change produces a new route with a freshly built URL.
 */
export class Route {
  public readonly method: HttpMethod;
  public readonly path: string;
  public readonly params: Readonly<ParamMapping>;
  public readonly json: Readonly<Record<string, unknown>>;
  public readonly headers: Readonly<Record<string, string>>;
  public readonly useId: boolean;
  public readonly tokenFor: string;
  public readonly duplicateKey: boolean;
  public readonly baseUrl: string;
  public readonly url: string;

  constructor(method: HttpMethod, path: string, init: RouteInit = {}) {
    this.method = method;
    this.path = trimPath(path);
    this.json = { ...(init.json ?? {}) };
    this.headers = { ...(init.headers ?? {}) };
    this.useId = init.useId ?? false;
    this.tokenFor = init.tokenFor === null || init.tokenFor === undefined ? '' : String(init.tokenFor);
    this.duplicateKey = init.duplicateKey ?? !this.useId;

    const built = buildRouteUrl(
      { path: this.path, params: init.params ?? {}, useId: this.useId },
      { removeNone: init.removeNone, duplicateKey: this.duplicateKey }
    );
    this.params = built.params;
    this.baseUrl = built.baseUrl;
    this.url = built.url;
  }

  /** New route with `update` merged over the current params (new keys win). */
  withParams(update: ParamMapping, opts: { removeNone?: boolean } = {}): Route {
    return new Route(this.method, this.path, {
      ...this.init(),
      params: { ...this.params, ...update },
      removeNone: opts.removeNone ?? true,
    });
  }

  withHeaders(headers: Record<string, string>): Route {
    return new Route(this.method, this.path, {
      ...this.init(),
      headers: { ...this.headers, ...headers },
      removeNone: false,
    });
  }

  describe(): string {
    return `${this.method}[${this.baseUrl}]`;
  }

  toString(): string {
    return this.url;
  }

  private init(): RouteInit {
    return {
      params: { ...this.params },
      json: { ...this.json },
      headers: { ...this.headers },
      useId: this.useId,
      tokenFor: this.tokenFor,
      duplicateKey: this.duplicateKey,
    };
  }
}
