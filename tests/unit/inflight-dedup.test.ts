import { InflightDedup } from '../../src/reference/inflight-dedup';

describe('In-Flight Request Deduplication', () => {
  it('should execute the function and return the result', async () => {
    const dedup = new InflightDedup<{ value: number }>();
    expect(await dedup.run('key-1', async () => ({ value: 42 }))).toEqual({ value: 42 });
  });

  it('should deduplicate concurrent identical calls', async () => {
    const dedup = new InflightDedup<number>();
    let callCount = 0;
    const execute = () =>
      new Promise<number>((resolve) => {
        callCount++;
        setTimeout(() => resolve(callCount), 20);
      });

    const [result1, result2] = await Promise.all([
      dedup.run('item_spells_fireball', execute),
      dedup.run('item_spells_fireball', execute),
    ]);

    expect(callCount).toBe(1);
    expect(result1).toBe(1);
    expect(result2).toBe(1);
  });

  it('should not deduplicate calls with different keys', async () => {
    const dedup = new InflightDedup<number>();
    let callCount = 0;
    const execute = async () => ++callCount;

    await Promise.all([dedup.run('key-a', execute), dedup.run('key-b', execute)]);

    expect(callCount).toBe(2);
  });

  it('should clean up after completion and after failure', async () => {
    const dedup = new InflightDedup<number>();
    const pending = dedup.run('ok', async () => 1);
    expect(dedup.size).toBe(1);
    await pending;

    await expect(
      dedup.run('fail', async () => {
        throw new Error('Execution failed');
      }),
    ).rejects.toThrow('Execution failed');
    expect(dedup.size).toBe(0);
  });

  it('should allow new execution after previous one completes', async () => {
    const dedup = new InflightDedup<number>();
    let callCount = 0;
    const execute = async () => ++callCount;

    expect(await dedup.run('reuse-key', execute)).toBe(1);
    expect(await dedup.run('reuse-key', execute)).toBe(2);
  });
});
