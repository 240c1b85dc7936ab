import { DEFAULT_PAGE_SIZE, HelixPageEnvelopeSchema } from '@helix-sdk/contracts';
import type { Route } from './route.js';
import { HelixProtocolError } from '../shared/errors.js';

export type Converter<T> = (raw: unknown) => T | Promise<T>;

/**
 * Pagination cursor. `not_started` and `exhausted` are distinct: the first
 * means no page was fetched yet, the second that the server reported no more.
 */
export type Cursor = { kind: 'not_started' } | { kind: 'continue'; token: string } | { kind: 'exhausted' };

export interface JsonRequester {
  requestJson(route: Route): Promise<unknown>;
}

export type PaginatorOptions<T> = {
  /** Cap on items delivered across all pages. */
  maxResults?: number | null;
  converter: Converter<T>;
};

function readPageSize(route: Route): number {
  const raw = route.params.first;
  if (typeof raw === 'number' && Number.isFinite(raw)) return Math.floor(raw);
  if (typeof raw === 'string') {
    const parsed = Number.parseInt(raw, 10);
    if (Number.isFinite(parsed)) return parsed;
  }
  return DEFAULT_PAGE_SIZE;
}

/**
 * Lazy, cursor-following view over a paginated Helix endpoint.
 *
 * Iterate it with `for await` to walk every page, or `await` it directly to
 * get the current buffer (fetching one page if the buffer is empty). Awaiting
 * does NOT drain the remaining pages.
 *
 * Not safe for concurrent consumption: two callers stepping the same
 * paginator race on the cursor and the buffer.
 */
export class HelixPaginator<T> implements AsyncIterableIterator<T>, PromiseLike<T[]> {
  private route: Route;
  private cursor: Cursor = { kind: 'not_started' };
  private remaining: number | null;
  private readonly buffer: T[] = [];
  private readonly converter: Converter<T>;
  public readonly pageSize: number;

  constructor(
    private readonly http: JsonRequester,
    route: Route,
    options: PaginatorOptions<T>
  ) {
    this.remaining = options.maxResults ?? null;
    this.converter = options.converter;

    let first = readPageSize(route);
    if (this.remaining !== null && this.remaining < first) {
      first = this.remaining;
    }
    this.pageSize = first;
    this.route = first > 0 && first !== readPageSize(route) ? route.withParams({ first }) : route;
  }

  get currentCursor(): Cursor {
    return this.cursor;
  }

  get currentRoute(): Route {
    return this.route;
  }

  get buffered(): number {
    return this.buffer.length;
  }

  /**
   * Fetch one page into the buffer. Resolves `false` without touching the
   * network once the cursor is exhausted or the budget is spent. A failed
   * fetch leaves cursor, budget and buffer as they were.
   */
  async fetchNextPage(): Promise<boolean> {
    if (this.cursor.kind === 'exhausted') return false;
    if (this.remaining !== null && this.remaining <= 0) return false;

    const route = this.route.withParams({ after: this.cursor.kind === 'continue' ? this.cursor.token : null });
    const body = await this.http.requestJson(route);

    const page = HelixPageEnvelopeSchema.safeParse(body);
    if (!page.success) {
      throw new HelixProtocolError('Expected "data" key not found.', { url: route.url, issues: page.error.issues });
    }

    const token = page.data.pagination?.cursor;
    const nextCursor: Cursor = token ? { kind: 'continue', token } : { kind: 'exhausted' };

    let remaining = this.remaining;
    const converted: T[] = [];
    for (const raw of page.data.data) {
      if (remaining !== null) {
        remaining -= 1;
        // Overshoot item on the last needed page is dropped unconverted.
        if (remaining < 0) break;
      }
      converted.push(await this.converter(raw));
    }

    this.route = route;
    this.cursor = nextCursor;
    this.remaining = remaining;
    this.buffer.push(...converted);
    return true;
  }

  async next(): Promise<IteratorResult<T, undefined>> {
    if (this.buffer.length === 0) {
      await this.fetchNextPage();
    }
    if (this.buffer.length === 0) {
      return { done: true, value: undefined };
    }
    const [item] = this.buffer.splice(0, 1);
    return { done: false, value: item };
  }

  [Symbol.asyncIterator](): this {
    return this;
  }

  private async flatten(): Promise<T[]> {
    if (this.buffer.length === 0) {
      await this.fetchNextPage();
    }
    return [...this.buffer];
  }

  then<TResult1 = T[], TResult2 = never>(
    onfulfilled?: ((value: T[]) => TResult1 | PromiseLike<TResult1>) | null,
    onrejected?: ((reason: unknown) => TResult2 | PromiseLike<TResult2>) | null
  ): Promise<TResult1 | TResult2> {
    return this.flatten().then(onfulfilled, onrejected);
  }
}
