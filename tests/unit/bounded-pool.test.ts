import { mapBounded } from '../../src/reference/bounded-pool';

const sleep = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

describe('mapBounded', () => {
  it('keeps input order regardless of completion order', async () => {
    const delays = [30, 5, 15, 0];
    const results = await mapBounded(delays, 4, async (ms, position) => {
      await sleep(ms);
      return `${position}:${ms}`;
    });
    expect(results).toEqual(['0:30', '1:5', '2:15', '3:0']);
  });

  it('never runs more than the limit at once', async () => {
    let inflight = 0;
    let peak = 0;
    await mapBounded([1, 2, 3, 4, 5, 6, 7], 3, async () => {
      inflight++;
      peak = Math.max(peak, inflight);
      await sleep(2);
      inflight--;
    });
    expect(peak).toBe(3);
  });

  it('treats a non-positive limit as one', async () => {
    let inflight = 0;
    let peak = 0;
    await mapBounded([1, 2, 3], 0, async () => {
      inflight++;
      peak = Math.max(peak, inflight);
      await sleep(1);
      inflight--;
    });
    expect(peak).toBe(1);
  });

  it('handles an empty input', async () => {
    expect(await mapBounded([], 4, async () => 1)).toEqual([]);
  });

  it('rejects with the first worker error and stops taking items', async () => {
    const seen: number[] = [];
    await expect(
      mapBounded([1, 2, 3, 4], 1, async (n) => {
        seen.push(n);
        if (n === 2) throw new Error('boom');
        return n;
      }),
    ).rejects.toThrow('boom');
    expect(seen).toEqual([1, 2]);
  });
});
