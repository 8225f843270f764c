/**
 * Cache Service
 *
 * In-memory TTL store with optional write-through to a durable backend
 * (file by default, Redis when configured). Expiry is evaluated lazily on
 * read; nothing is swept. Tracks hit/miss metrics via Prometheus.
 */

import { CacheConfig, CacheEntry, CacheLookup, CacheStats, CacheStore, DurableBackend } from './types';
import { FileBackend, KeyPartitioner } from './file-backend';
import { RedisBackend, RedisCommands } from './redis-backend';
import { logger } from '../observability/logger';
import { cacheLookupsTotal, cacheWriteErrorsTotal } from '../observability/metrics';

const HOUR_MS = 60 * 60 * 1000;

export class TtlCacheStore implements CacheStore {
  private readonly entries = new Map<string, CacheEntry>();
  /** Per-key write serialization: last write wins in memory and on disk alike */
  private readonly writeChains = new Map<string, Promise<boolean>>();
  private readonly ttlMs: number;
  private readonly now: () => number;
  private _hits = 0;
  private _misses = 0;
  private _writes = 0;
  private _writeErrors = 0;
  private readonly log = logger.child({ component: 'cache-store' });

  constructor(
    config: CacheConfig,
    private readonly backend?: DurableBackend,
  ) {
    this.ttlMs = Math.round(config.ttlHours * HOUR_MS);
    this.now = config.now ?? Date.now;
  }

  async get(key: string): Promise<CacheLookup> {
    const entry = await this.lookup(key);
    if (!entry) {
      this._misses++;
      cacheLookupsTotal.inc({ result: 'miss' });
      this.log.debug({ key }, 'Cache miss');
      return { hit: false };
    }
    this._hits++;
    cacheLookupsTotal.inc({ result: 'hit' });
    return { hit: true, value: entry.value };
  }

  async has(key: string): Promise<boolean> {
    return (await this.lookup(key)) !== undefined;
  }

  set(key: string, value: unknown): Promise<boolean> {
    const previous = this.writeChains.get(key) ?? Promise.resolve(true);
    const next: Promise<boolean> = previous
      .then(() => this.write(key, value))
      .then((stored) => {
        if (this.writeChains.get(key) === next) this.writeChains.delete(key);
        return stored;
      });
    this.writeChains.set(key, next);
    return next;
  }

  stats(): CacheStats {
    return {
      hits: this._hits,
      misses: this._misses,
      writes: this._writes,
      writeErrors: this._writeErrors,
      size: this.entries.size,
      backend: this.backend?.kind ?? 'memory',
    };
  }

  async ping(): Promise<boolean> {
    if (!this.backend) return true;
    try {
      await this.backend.ping();
      return true;
    } catch (err) {
      this.log.warn({ err, backend: this.backend.kind }, 'Cache backend ping failed');
      return false;
    }
  }

  /** Live (unexpired) entry from memory, else from the durable backend */
  private async lookup(key: string): Promise<CacheEntry | undefined> {
    const entry = this.entries.get(key) ?? (await this.loadDurable(key));
    if (!entry || this.isExpired(entry)) return undefined;
    return entry;
  }

  private async write(key: string, value: unknown): Promise<boolean> {
    const entry: CacheEntry = { key, value, createdAt: this.now(), ttlMs: this.ttlMs };

    if (this.backend) {
      try {
        await this.backend.writeRaw(key, JSON.stringify(entry), this.ttlMs);
      } catch (err) {
        this._writeErrors++;
        cacheWriteErrorsTotal.inc();
        this.log.warn({ err, key, backend: this.backend.kind }, 'Durable cache write failed; value not cached');
        return false;
      }
    }

    this.entries.set(key, entry);
    this._writes++;
    return true;
  }

  private async loadDurable(key: string): Promise<CacheEntry | undefined> {
    if (!this.backend) return undefined;

    let raw: string | null;
    try {
      raw = await this.backend.readRaw(key);
    } catch (err) {
      this.log.warn({ err, key, backend: this.backend.kind }, 'Durable cache read failed');
      return undefined;
    }
    if (raw === null) return undefined;

    const entry = parseEntry(raw, key);
    if (!entry) {
      this.log.warn({ key, backend: this.backend.kind }, 'Discarding unreadable durable cache record');
      return undefined;
    }
    if (this.isExpired(entry)) return undefined;

    // A concurrent set may have landed while we were reading
    if (!this.entries.has(key)) this.entries.set(key, entry);
    return this.entries.get(key);
  }

  private isExpired(entry: CacheEntry): boolean {
    return this.now() - entry.createdAt > entry.ttlMs;
  }
}

function parseEntry(raw: string, key: string): CacheEntry | undefined {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return undefined;
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) return undefined;
  if (!('value' in parsed) || !('createdAt' in parsed) || !('ttlMs' in parsed) || !('key' in parsed)) {
    return undefined;
  }
  const { value, createdAt, ttlMs } = parsed;
  if (parsed.key !== key) return undefined;
  if (typeof createdAt !== 'number' || !Number.isFinite(createdAt)) return undefined;
  if (typeof ttlMs !== 'number' || !Number.isFinite(ttlMs)) return undefined;
  return { key, value, createdAt, ttlMs };
}

// ───── Factory ──────────────────────────────────────────────────

export interface CacheStoreOptions extends CacheConfig {
  persistent: boolean;
  backend: 'file' | 'redis';
  cacheDir: string;
  /** Subdirectory per key for the file backend */
  partition?: KeyPartitioner;
  redis?: RedisCommands;
  redisKeyPrefix?: string;
}

export function createCacheStore(options: CacheStoreOptions): CacheStore {
  if (!options.persistent) {
    logger.info({ ttlHours: options.ttlHours }, 'Cache store: in-memory');
    return new TtlCacheStore(options);
  }

  if (options.backend === 'redis') {
    if (options.redis) {
      logger.info({ ttlHours: options.ttlHours }, 'Cache store: Redis-backed');
      return new TtlCacheStore(options, new RedisBackend(options.redis, options.redisKeyPrefix));
    }
    logger.warn('Redis cache backend requested but Redis is unavailable; using file persistence');
  }

  logger.info({ ttlHours: options.ttlHours, cacheDir: options.cacheDir }, 'Cache store: file-backed');
  return new TtlCacheStore(
    options,
    new FileBackend({ rootDir: options.cacheDir, partition: options.partition }),
  );
}
