import { Connection, Edge } from "../types/contracts.js";

export type PageFetcher<T> = (cursor: string, pageSize: number, signal?: AbortSignal) => Promise<Connection<T>>;

export interface WalkOptions {
  pageSize: number;
  signal?: AbortSignal;
}

export interface CollectResult<T> {
  edges: Edge<T>[];
  pages: number;
  // false when the walk stopped on a page that still claimed more results
  complete: boolean;
}

export interface SampleResult {
  count: number;
  pages: number;
  isEstimate: boolean;
}

export const DEFAULT_SAMPLE_PAGES = 3;

/**
 * Exhaustive walk: follows endCursor until hasNextPage is false and returns
 * every edge in fetch order. Stops early, with complete=false, when a page
 * claims more results but hands back an empty or unchanged cursor.
 */
export async function collectAll<T>(fetchPage: PageFetcher<T>, opts: WalkOptions): Promise<CollectResult<T>> {
  const edges: Edge<T>[] = [];
  let cursor = "";
  let pages = 0;

  for (;;) {
    opts.signal?.throwIfAborted();
    const page = await fetchPage(cursor, opts.pageSize, opts.signal);
    pages++;
    edges.push(...page.edges);

    const { hasNextPage, endCursor } = page.pageInfo;
    if (!hasNextPage) return { edges, pages, complete: true };
    if (!endCursor || endCursor === cursor) return { edges, pages, complete: false };
    cursor = endCursor;
  }
}

/**
 * Bounded walk: counts edges over at most `maxPages` pages. Nodes are not
 * kept. isEstimate is set when the last page fetched still had more behind it,
 * in which case count is a lower bound.
 */
export async function sampleCount<T>(
  fetchPage: PageFetcher<T>,
  opts: WalkOptions & { maxPages?: number }
): Promise<SampleResult> {
  const maxPages = Math.max(1, opts.maxPages ?? DEFAULT_SAMPLE_PAGES);
  let cursor = "";
  let count = 0;
  let pages = 0;

  for (;;) {
    opts.signal?.throwIfAborted();
    const page = await fetchPage(cursor, opts.pageSize, opts.signal);
    pages++;
    count += page.edges.length;

    const { hasNextPage, endCursor } = page.pageInfo;
    if (!hasNextPage) return { count, pages, isEstimate: false };
    if (pages >= maxPages || !endCursor || endCursor === cursor) return { count, pages, isEstimate: true };
    cursor = endCursor;
  }
}
