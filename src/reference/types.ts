/**
 * Reference data types shared by the fetcher, prefetcher and search engine.
 */

/** Lightweight listing entry for one item of a category */
export interface CategoryItemSummary {
  name: string;
  index: string;
  uri: string;
}

/** One entry of the upstream root index */
export interface CategoryIndexEntry {
  name: string;
  description: string;
  uri: string;
}

/** Full upstream payload for a single item; shape varies by category */
export type ItemDetail = Record<string, unknown>;

export type FetchErrorKind = 'not_found' | 'unavailable' | 'malformed' | 'invalid_input';

export interface FetchError {
  kind: FetchErrorKind;
  message: string;
  /** Upstream HTTP status, when one was received */
  status?: number;
}

export type CacheSource = 'cache' | 'upstream';

export type FetchResult<T> =
  | { ok: true; value: T; source: CacheSource }
  | { ok: false; error: FetchError };

export function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
