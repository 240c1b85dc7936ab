import { http, HttpResponse } from 'msw';
import { describe, expect, it, vi } from 'vitest';
import { HttpClient, jsonOrText } from '../src/http/httpClient.js';
import { Route } from '../src/http/route.js';
import type { HttpSession, SessionRequest } from '../src/http/session.js';
import { HelixAssetError, HelixContentTypeError, HelixHttpError, HelixProtocolError } from '../src/shared/errors.js';
import type { Logger } from '../src/utils/logger.js';
import { HELIX } from './mocks/helixApi.mock.js';
import { mockServer, recordedRequests } from './mocks/server.js';

function jsonResponse(body: unknown, init: { status?: number } = {}): Response {
  return new Response(JSON.stringify(body), {
    status: init.status ?? 200,
    headers: { 'Content-Type': 'application/json' },
  });
}

class StubSession implements HttpSession {
  closed = false;
  headers: Record<string, string> = {};
  readonly requests: SessionRequest[] = [];

  constructor(
    private readonly respond: (req: SessionRequest) => Response = () => jsonResponse({ data: [] }),
    private readonly failOnClose = false
  ) {}

  updateHeaders(headers: Record<string, string>): void {
    this.headers = { ...this.headers, ...headers };
  }

  async request(req: SessionRequest): Promise<Response> {
    this.requests.push(req);
    return this.respond(req);
  }

  async close(): Promise<void> {
    this.closed = true;
    if (this.failOnClose) throw new Error('close exploded');
  }
}

function createLogger() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() } satisfies Logger;
}

describe('HttpClient.request', () => {
  it('sends the default headers and returns parsed JSON', async () => {
    const client = new HttpClient({ clientId: 'test-client-id' });
    const body = await client.requestJson(new Route('GET', 'games/top', { params: { first: 3 } }));

    expect(body).toMatchObject({ pagination: { cursor: 'games-page-2' } });
    const [request] = recordedRequests();
    expect(request.url).toBe('https://api.twitch.tv/helix/games/top?first=3');
    expect(request.headers.get('Client-ID')).toBe('test-client-id');
    expect(request.headers.get('User-Agent')).toMatch(/^HelixSdk \(0\.1\.0\) Node\.js\//);
    await client.close();
  });

  it('raises HelixHttpError with status, route and body on 4xx', async () => {
    mockServer.use(
      http.get(`${HELIX}/users`, () =>
        HttpResponse.json({ error: 'Not Found', status: 404, message: 'missing' }, { status: 404 })
      )
    );
    const client = new HttpClient({ clientId: 'test-client-id' });
    const route = new Route('GET', 'users', { params: { id: '1' } });

    const error = await client.request(route).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(HelixHttpError);
    if (!(error instanceof HelixHttpError)) throw error;
    expect(error.status).toBe(404);
    expect(error.route).toBe(route);
    expect(error.body).toEqual({ error: 'Not Found', status: 404, message: 'missing' });
    await client.close();
  });

  it('keeps a text error body as text', async () => {
    mockServer.use(http.get(`${HELIX}/streams`, () => HttpResponse.text('upstream down', { status: 503 })));
    const client = new HttpClient({ clientId: 'test-client-id' });

    await expect(client.request(new Route('GET', 'streams'))).rejects.toMatchObject({
      status: 503,
      body: 'upstream down',
    });
    await client.close();
  });

  it('returns text for a non-JSON success and requestJson rejects it', async () => {
    mockServer.use(http.get(`${HELIX}/streams`, () => HttpResponse.text('OK')));
    const client = new HttpClient({ clientId: 'test-client-id' });
    const route = new Route('GET', 'streams');

    await expect(client.request(route)).resolves.toBe('OK');
    await expect(client.requestJson(route)).rejects.toBeInstanceOf(HelixContentTypeError);
    await client.close();
  });

  it('rejects a body that declares JSON but is not', async () => {
    mockServer.use(
      http.get(`${HELIX}/streams`, () => new HttpResponse('{not json', { headers: { 'Content-Type': 'application/json' } }))
    );
    const client = new HttpClient({ clientId: 'test-client-id' });

    await expect(client.request(new Route('GET', 'streams'))).rejects.toBeInstanceOf(HelixProtocolError);
    await client.close();
  });

  it('sends a non-empty json body and omits an empty one', async () => {
    const seen: { contentType: string | null; body: string }[] = [];
    mockServer.use(
      http.post(`${HELIX}/channels/commercial`, async ({ request }) => {
        seen.push({ contentType: request.headers.get('Content-Type'), body: await request.text() });
        return new HttpResponse(null, { status: 204 });
      })
    );
    const client = new HttpClient({ clientId: 'test-client-id' });

    await client.request(new Route('POST', 'channels/commercial', { json: { broadcaster_id: '1', length: 30 } }));
    await client.request(new Route('POST', 'channels/commercial'));

    expect(seen).toEqual([
      { contentType: 'application/json', body: '{"broadcaster_id":"1","length":30}' },
      { contentType: null, body: '' },
    ]);
    await client.close();
  });

  it('merges route headers and the authorize hook into the request', async () => {
    const session = new StubSession();
    const client = new HttpClient({
      clientId: 'test-client-id',
      session,
      authorize: (route) => ({ Authorization: `Bearer token-for-${route.tokenFor}` }),
    });

    await client.request(new Route('GET', 'streams', { tokenFor: 123, headers: { 'X-Trace': 'abc' } }));

    expect(session.requests[0]?.headers).toEqual({ 'X-Trace': 'abc', Authorization: 'Bearer token-for-123' });
  });
});

describe('HttpClient session lifecycle', () => {
  it('initialises the session once and reuses it', async () => {
    const logger = createLogger();
    const session = new StubSession();
    const client = new HttpClient({ clientId: 'test-client-id', session, userAgent: 'TestAgent/1.0', logger });

    await client.request(new Route('GET', 'streams'));
    await client.request(new Route('GET', 'games/top'));

    expect(session.requests.map((req) => req.url)).toEqual([
      'https://api.twitch.tv/helix/streams',
      'https://api.twitch.tv/helix/games/top',
    ]);
    expect(session.headers).toEqual({ 'User-Agent': 'TestAgent/1.0', 'Client-ID': 'test-client-id' });
    expect(logger.debug.mock.calls.filter(([event]) => event === 'helix.session.init')).toHaveLength(1);
  });

  it('opens a session lazily', async () => {
    const client = new HttpClient({ clientId: 'test-client-id' });
    expect(client.hasOpenSession).toBe(false);

    await client.request(new Route('GET', 'streams'));
    expect(client.hasOpenSession).toBe(true);

    await client.close();
    expect(client.hasOpenSession).toBe(false);
  });

  it('close is a no-op without a session', async () => {
    const logger = createLogger();
    const client = new HttpClient({ clientId: 'test-client-id', logger });
    await client.close();
    expect(logger.debug).not.toHaveBeenCalled();
  });

  it('close swallows and logs a teardown failure', async () => {
    const logger = createLogger();
    const session = new StubSession(undefined, true);
    const client = new HttpClient({ clientId: 'test-client-id', session, logger });
    await client.request(new Route('GET', 'streams'));

    await expect(client.close()).resolves.toBeUndefined();

    expect(logger.debug).toHaveBeenCalledWith('helix.session.close_failed', {
      client: 'HttpClient',
      name: 'Error',
      message: 'close exploded',
    });
    expect(client.hasOpenSession).toBe(false);
  });

  it('clear drops a session closed from outside and the next request opens a new one', async () => {
    const session = new StubSession();
    const client = new HttpClient({ clientId: 'test-client-id', session });
    await client.request(new Route('GET', 'streams'));

    await session.close();
    client.clear();
    expect(client.hasOpenSession).toBe(false);

    await client.request(new Route('GET', 'streams'));
    expect(session.requests).toHaveLength(1);
    expect(recordedRequests().map((req) => req.url)).toEqual(['https://api.twitch.tv/helix/streams']);
    expect(client.hasOpenSession).toBe(true);
    await client.close();
  });

  it('clear leaves an open session in place', async () => {
    const session = new StubSession();
    const client = new HttpClient({ clientId: 'test-client-id', session });
    await client.request(new Route('GET', 'streams'));

    client.clear();
    await client.request(new Route('GET', 'streams'));
    expect(session.requests).toHaveLength(2);
  });
});

describe('jsonOrText', () => {
  it('parses JSON with a charset suffix', async () => {
    const response = new Response('{"data":[]}', { headers: { 'Content-Type': 'application/json; charset=utf-8' } });
    await expect(jsonOrText(response)).resolves.toEqual({ data: [] });
  });

  it('returns text for other content types', async () => {
    const response = new Response('{"data":[]}', { headers: { 'Content-Type': 'text/plain' } });
    await expect(jsonOrText(response)).resolves.toBe('{"data":[]}');
  });
});

describe('HttpClient assets', () => {
  const ASSET_URL = 'https://static-cdn.example/boxart/1001-52x72.jpg';

  async function collectChunks(stream: AsyncIterable<Uint8Array>): Promise<number[][]> {
    const chunks: number[][] = [];
    for await (const chunk of stream) chunks.push(Array.from(chunk));
    return chunks;
  }

  it('returns the headers of an asset', async () => {
    mockServer.use(
      http.head(ASSET_URL, () => new HttpResponse(null, { headers: { 'Content-Type': 'image/jpeg', 'X-Asset-Id': 'box-1001' } }))
    );
    const client = new HttpClient({ clientId: 'test-client-id' });

    const headers = await client.requestAssetHead(ASSET_URL);

    expect(headers).toMatchObject({ 'content-type': 'image/jpeg', 'x-asset-id': 'box-1001' });
    expect(recordedRequests().map((req) => req.method)).toEqual(['HEAD']);
    expect(client.hasOpenSession).toBe(true);
    await client.close();
  });

  it('rejects asset headers on any status but 200', async () => {
    mockServer.use(http.head(ASSET_URL, () => new HttpResponse(null, { status: 204 })));
    const client = new HttpClient({ clientId: 'test-client-id' });

    await expect(client.requestAssetHead(ASSET_URL)).rejects.toThrow(
      `Failed to request headers for asset at "${ASSET_URL}" with status 204.`
    );
    await client.close();
  });

  it('streams the body in chunks of the requested size', async () => {
    mockServer.use(http.get(ASSET_URL, () => new HttpResponse(new Uint8Array([0, 1, 2, 3, 4, 5, 6, 7, 8, 9]))));
    const client = new HttpClient({ clientId: 'test-client-id' });

    const stream = client.requestAsset(ASSET_URL, { chunkSize: 4 });
    expect(recordedRequests()).toHaveLength(0);

    expect(await collectChunks(stream)).toEqual([
      [0, 1, 2, 3],
      [4, 5, 6, 7],
      [8, 9],
    ]);
    await client.close();
  });

  it('stops reading when the consumer breaks early', async () => {
    mockServer.use(http.get(ASSET_URL, () => new HttpResponse(new Uint8Array([9, 8, 7, 6, 5]))));
    const client = new HttpClient({ clientId: 'test-client-id' });

    const seen: number[][] = [];
    for await (const chunk of client.requestAsset(ASSET_URL, { chunkSize: 2 })) {
      seen.push(Array.from(chunk));
      break;
    }

    expect(seen).toEqual([[9, 8]]);
    await client.close();
  });

  it('raises HelixAssetError with status and text on a missing asset', async () => {
    mockServer.use(http.get(ASSET_URL, () => HttpResponse.text('no such asset', { status: 404 })));
    const client = new HttpClient({ clientId: 'test-client-id' });

    const error = await client
      .requestAsset(ASSET_URL)
      .next()
      .catch((err: unknown) => err);

    expect(error).toBeInstanceOf(HelixAssetError);
    if (!(error instanceof HelixAssetError)) throw error;
    expect(error.status).toBe(404);
    expect(error.body).toBe('no such asset');
    expect(error.message).toBe(`Failed to get asset at "${ASSET_URL}" with status 404.`);
    await client.close();
  });
});
