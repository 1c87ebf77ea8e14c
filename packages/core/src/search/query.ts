import { withQuery, type QueryParams } from "../http/client.js";

export type QueryValue = number | string;

/** `"plain"` requests the collection itself; `"search"` requests `{baseUrl}search/`. */
export type SearchMode = "plain" | "search";

/**
 * Immutable description of a collection request. Builders produce a new
 * value for every change.
 */
export interface CollectionQuery {
  readonly baseUrl: string;
  readonly mode: SearchMode;
  readonly filters: ReadonlyMap<string, QueryValue>;
  /** Page size sent as `limit`. */
  readonly pageLimit?: number;
  /** Upper bound on the number of items ever yielded. */
  readonly maxItems?: number;
}

export const LIMIT_ZERO: QueryParams = [
  ["limit", 0],
  ["offset", 0],
];

export const LIMIT_ONE: QueryParams = [
  ["limit", 1],
  ["offset", 0],
];

/**
 * URL of the first request for `query`. `extra` parameters (e.g.
 * {@link LIMIT_ZERO}) override the query's own page limit.
 */
export function initialUrl(query: CollectionQuery, extra?: QueryParams): string {
  const base =
    query.mode === "search" ? `${query.baseUrl}search/` : query.baseUrl;
  const params: Array<readonly [string, QueryValue]> = [...query.filters];
  if (query.pageLimit !== undefined) {
    params.push(["limit", query.pageLimit]);
  }
  if (extra !== undefined) {
    params.push(...extra);
  }
  return withQuery(base, params);
}
