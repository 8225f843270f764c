/**
 * Cache Infrastructure Types
 *
 * In-memory TTL cache with an optional durable backend (file or Redis).
 * Used by: ItemFetcher (and through it Prefetcher + relevance search)
 */

export interface CacheEntry<T = unknown> {
  key: string;
  value: T;
  /** Epoch ms at write time */
  createdAt: number;
  /** Fixed at write time */
  ttlMs: number;
}

export interface CacheConfig {
  /** Entry lifetime in hours */
  ttlHours: number;
  /** Clock override, tests only */
  now?: () => number;
}

export type CacheLookup<T = unknown> = { hit: true; value: T } | { hit: false };

export interface CacheStats {
  hits: number;
  misses: number;
  writes: number;
  writeErrors: number;
  /** Entries currently held in memory (expired ones included until overwritten) */
  size: number;
  backend: 'memory' | DurableBackend['kind'];
}

export interface CacheStore {
  get(key: string): Promise<CacheLookup>;
  /** Resolves false when the value could not be stored */
  set(key: string, value: unknown): Promise<boolean>;
  has(key: string): Promise<boolean>;
  stats(): CacheStats;
  /** Resolves true when the durable backend answers (or there is none) */
  ping(): Promise<boolean>;
}

/**
 * Raw durable storage. Payloads are opaque serialized CacheEntry records;
 * validation happens in the CacheStore.
 */
export interface DurableBackend {
  readonly kind: 'file' | 'redis';
  /** null when nothing is stored under the key */
  readRaw(key: string): Promise<string | null>;
  writeRaw(key: string, payload: string, ttlMs: number): Promise<void>;
  ping(): Promise<void>;
}
