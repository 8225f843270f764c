import { TtlCacheStore } from '../../src/cache/cache-service';
import { ItemFetcher } from '../../src/reference/item-fetcher';
import { Prefetcher } from '../../src/reference/prefetcher';
import { UpstreamClient } from '../../src/reference/upstream-client';
import { BASE_URL, createFakeUpstream, fixture, jsonResponse } from '../helpers/fake-upstream';

function setup(concurrency = 4) {
  const upstream = createFakeUpstream();
  const cache = new TtlCacheStore({ ttlHours: 1 });
  const client = new UpstreamClient({ baseUrl: BASE_URL, timeoutMs: 1_000, fetchImpl: upstream.fetch });
  const fetcher = new ItemFetcher({ cache, upstream: client });
  const prefetcher = new Prefetcher(fetcher, { categories: ['spells', 'monsters'], concurrency });
  return { upstream, fetcher, prefetcher };
}

const sleep = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

describe('Prefetcher', () => {
  it('warms every item of each category', async () => {
    const { prefetcher, fetcher } = setup();

    const reports = await prefetcher.warm(['spells', 'monsters']);

    expect(reports.map(({ category, listed, fetched, skipped, failed }) => ({ category, listed, fetched, skipped, failed }))).toEqual([
      { category: 'spells', listed: 4, fetched: 4, skipped: 0, failed: 0 },
      { category: 'monsters', listed: 2, fetched: 2, skipped: 0, failed: 0 },
    ]);
    expect(await fetcher.isItemCached('monsters', 'goblin')).toBe(true);
    expect(prefetcher.lastReport()).toBe(reports);
  });

  it('is idempotent: a second warm-up makes no item calls', async () => {
    const { prefetcher, upstream } = setup();

    await prefetcher.warm(['spells']);
    const [second] = await prefetcher.warm(['spells']);

    expect(second.fetched).toBe(0);
    expect(second.skipped).toBe(4);
    for (const { index } of fixture.lists.spells) {
      expect(upstream.calls(`/spells/${index}`)).toBe(1);
    }
  });

  it('counts item failures and keeps going', async () => {
    const { prefetcher, upstream } = setup();
    upstream.override('/spells/cure-wounds', () => jsonResponse({}, 500));

    const [report] = await prefetcher.warm(['spells']);

    expect(report.fetched).toBe(3);
    expect(report.failed).toBe(1);
  });

  it('reports a category whose listing fails', async () => {
    const { prefetcher, upstream } = setup();
    upstream.override('/monsters', () => jsonResponse({}, 503));

    const [spells, monsters] = await prefetcher.warm(['spells', 'monsters']);

    expect(spells.fetched).toBe(4);
    expect(monsters.listed).toBe(0);
    expect(monsters.error).toBe('Upstream API responded with status 503');
  });

  it('keeps item fetches within the concurrency bound', async () => {
    const { prefetcher, upstream } = setup(2);
    let inflight = 0;
    let peak = 0;
    for (const { index } of fixture.lists.spells) {
      upstream.override(`/spells/${index}`, async () => {
        inflight++;
        peak = Math.max(peak, inflight);
        await sleep(5);
        inflight--;
        return jsonResponse(fixture.items.spells[index]);
      });
    }

    const [report] = await prefetcher.warm(['spells']);

    expect(report.fetched).toBe(4);
    expect(peak).toBe(2);
  });

  describe('background runs', () => {
    it('runs detached and refuses to overlap', async () => {
      const { prefetcher } = setup();

      expect(prefetcher.start()).toBe(true);
      expect(prefetcher.isRunning()).toBe(true);
      expect(prefetcher.start(['spells'])).toBe(false);

      expect(await prefetcher.drain()).toBe(true);
      expect(prefetcher.isRunning()).toBe(false);
      expect(prefetcher.lastReport()?.map((r) => r.category)).toEqual(['spells', 'monsters']);
    });

    it('drain gives up after its timeout', async () => {
      const { prefetcher, upstream } = setup();
      let release: () => void = () => undefined;
      const gate = new Promise<void>((resolve) => {
        release = resolve;
      });
      upstream.override('/spells', async () => {
        await gate;
        return jsonResponse({ count: 0, results: [] });
      });

      prefetcher.start(['spells']);
      expect(await prefetcher.drain(10)).toBe(false);

      release();
      expect(await prefetcher.drain()).toBe(true);
    });

    it('drain resolves at once when idle', async () => {
      const { prefetcher } = setup();
      expect(await prefetcher.drain(10)).toBe(true);
    });
  });
});
