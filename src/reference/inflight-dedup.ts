/**
 * In-Flight Request Deduplication
 *
 * When identical fetches arrive concurrently (same cache key), the second
 * caller awaits the first caller's promise instead of making a duplicate
 * upstream call. Prefetch lanes and searches hit the same keys often.
 */
export class InflightDedup<T> {
  private readonly inflight = new Map<string, Promise<T>>();

  /**
   * Execute with in-flight deduplication.
   * If an identical call (same key) is already in progress, returns the same promise.
   */
  run(key: string, execute: () => Promise<T>): Promise<T> {
    const existing = this.inflight.get(key);
    if (existing) return existing;

    const promise = execute().finally(() => this.inflight.delete(key));
    this.inflight.set(key, promise);
    return promise;
  }

  /** Count of in-flight calls (for metrics/debugging) */
  get size(): number {
    return this.inflight.size;
  }
}
