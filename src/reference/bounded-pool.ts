/**
 * Map `items` through `worker` with at most `limit` calls in flight.
 * Results keep the input order regardless of completion order.
 * A worker error rejects the whole map and stops lanes from taking new items.
 */
export async function mapBounded<T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T, position: number) => Promise<R>,
): Promise<R[]> {
  const results = new Array<R>(items.length);
  const laneCount = Math.max(1, Math.min(Math.floor(limit) || 1, items.length));
  let cursor = 0;
  let failed = false;

  const lane = async (): Promise<void> => {
    while (!failed && cursor < items.length) {
      const position = cursor++;
      try {
        results[position] = await worker(items[position], position);
      } catch (err) {
        failed = true;
        throw err;
      }
    }
  };

  await Promise.all(Array.from({ length: laneCount }, lane));
  return results;
}
