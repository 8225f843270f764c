import { DurableBackend } from './types';

/** The slice of the ioredis client the backend uses */
export interface RedisCommands {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, expiryMode: 'PX', ttlMs: number): Promise<unknown>;
  ping(): Promise<string>;
}

/**
 * Redis-backed durable cache storage.
 * Entries carry a Redis expiry matching their TTL so the keyspace does not grow unbounded.
 */
export class RedisBackend implements DurableBackend {
  readonly kind = 'redis' as const;

  constructor(
    private readonly redis: RedisCommands,
    private readonly keyPrefix: string = 'srd:cache:',
  ) {}

  readRaw(key: string): Promise<string | null> {
    return this.redis.get(this.prefixKey(key));
  }

  async writeRaw(key: string, payload: string, ttlMs: number): Promise<void> {
    await this.redis.set(this.prefixKey(key), payload, 'PX', Math.max(1, Math.round(ttlMs)));
  }

  async ping(): Promise<void> {
    await this.redis.ping();
  }

  private prefixKey(key: string): string {
    return `${this.keyPrefix}${key}`;
  }
}
