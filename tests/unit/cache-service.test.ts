import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { TtlCacheStore, createCacheStore } from '../../src/cache/cache-service';
import { DurableBackend } from '../../src/cache/types';
import { cachePartition } from '../../src/reference/item-fetcher';

const HOUR_MS = 60 * 60 * 1000;

/** Durable backend kept in a Map, with optional per-write delay */
class MapBackend implements DurableBackend {
  readonly kind = 'file' as const;
  readonly records = new Map<string, string>();
  failWrites = false;
  delayFor: (payload: string) => number = () => 0;

  async readRaw(key: string): Promise<string | null> {
    return this.records.get(key) ?? null;
  }

  async writeRaw(key: string, payload: string): Promise<void> {
    const delay = this.delayFor(payload);
    if (delay > 0) await new Promise((resolve) => setTimeout(resolve, delay));
    if (this.failWrites) throw new Error('disk full');
    this.records.set(key, payload);
  }

  async ping(): Promise<void> {
    if (this.failWrites) throw new Error('disk full');
  }
}

describe('TtlCacheStore', () => {
  describe('in memory', () => {
    it('returns a hit for a stored value and counts it', async () => {
      const store = new TtlCacheStore({ ttlHours: 1 });
      expect(await store.set('items_spells', [{ name: 'Fireball' }])).toBe(true);

      expect(await store.get('items_spells')).toEqual({ hit: true, value: [{ name: 'Fireball' }] });
      expect(await store.get('items_monsters')).toEqual({ hit: false });
      expect(store.stats()).toEqual({
        hits: 1,
        misses: 1,
        writes: 1,
        writeErrors: 0,
        size: 1,
        backend: 'memory',
      });
    });

    it('keeps an entry alive until its ttl has fully elapsed', async () => {
      let now = 1_000;
      const store = new TtlCacheStore({ ttlHours: 1, now: () => now });
      await store.set('categories', ['spells']);

      now = 1_000 + HOUR_MS;
      expect((await store.get('categories')).hit).toBe(true);

      now = 1_000 + HOUR_MS + 1;
      expect((await store.get('categories')).hit).toBe(false);
    });

    it('refreshes an expired entry on the next set', async () => {
      let now = 0;
      const store = new TtlCacheStore({ ttlHours: 1, now: () => now });
      await store.set('k', 'old');
      now = 2 * HOUR_MS;
      expect((await store.get('k')).hit).toBe(false);

      await store.set('k', 'new');
      expect(await store.get('k')).toEqual({ hit: true, value: 'new' });
    });

    it('has() follows the same visibility without touching counters', async () => {
      let now = 0;
      const store = new TtlCacheStore({ ttlHours: 1, now: () => now });
      await store.set('k', 1);

      expect(await store.has('k')).toBe(true);
      expect(await store.has('other')).toBe(false);
      now = HOUR_MS + 1;
      expect(await store.has('k')).toBe(false);
      expect(store.stats().hits).toBe(0);
      expect(store.stats().misses).toBe(0);
    });

    it('answers ping without a backend', async () => {
      expect(await new TtlCacheStore({ ttlHours: 1 }).ping()).toBe(true);
    });
  });

  describe('with a durable backend', () => {
    it('does not cache a value whose durable write failed', async () => {
      const backend = new MapBackend();
      backend.failWrites = true;
      const store = new TtlCacheStore({ ttlHours: 1 }, backend);

      expect(await store.set('k', 'v')).toBe(false);
      expect(await store.get('k')).toEqual({ hit: false });
      expect(store.stats().writeErrors).toBe(1);
      expect(store.stats().writes).toBe(0);
      expect(await store.ping()).toBe(false);
    });

    it('loads a record written by another instance with its original timestamps', async () => {
      let now = 0;
      const backend = new MapBackend();
      const first = new TtlCacheStore({ ttlHours: 1, now: () => now }, backend);
      await first.set('item_spells_fireball', { name: 'Fireball' });

      now = HOUR_MS / 2;
      const second = new TtlCacheStore({ ttlHours: 1, now: () => now }, backend);
      expect(await second.get('item_spells_fireball')).toEqual({ hit: true, value: { name: 'Fireball' } });

      now = HOUR_MS + 1;
      expect((await second.get('item_spells_fireball')).hit).toBe(false);
    });

    it('treats a record stored under a different key as a miss', async () => {
      const backend = new MapBackend();
      backend.records.set('k', JSON.stringify({ key: 'other', value: 1, createdAt: 0, ttlMs: HOUR_MS }));
      const store = new TtlCacheStore({ ttlHours: 1, now: () => 0 }, backend);

      expect(await store.get('k')).toEqual({ hit: false });
    });

    it('serialises writes to one key so the last write wins everywhere', async () => {
      const backend = new MapBackend();
      backend.delayFor = (payload) => (payload.includes('"first"') ? 30 : 0);
      const store = new TtlCacheStore({ ttlHours: 1 }, backend);

      const results = await Promise.all([store.set('k', 'first'), store.set('k', 'second')]);

      expect(results).toEqual([true, true]);
      expect(await store.get('k')).toEqual({ hit: true, value: 'second' });
      const raw = backend.records.get('k');
      expect(raw && JSON.parse(raw).value).toBe('second');
    });
  });
});

describe('createCacheStore', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'srd-cache-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  const fileStore = (now: () => number = Date.now) =>
    createCacheStore({
      ttlHours: 1,
      now,
      persistent: true,
      backend: 'file',
      cacheDir: dir,
      partition: cachePartition,
    });

  it('persists entries across instances in per-category directories', async () => {
    await fileStore().set('item_spells_fireball', { index: 'fireball' });

    const file = path.join(dir, 'spells', 'item_spells_fireball.json');
    const record = JSON.parse(await fs.readFile(file, 'utf8'));
    expect(record.key).toBe('item_spells_fireball');
    expect(record.value).toEqual({ index: 'fireball' });

    const reopened = fileStore();
    expect(await reopened.get('item_spells_fireball')).toEqual({ hit: true, value: { index: 'fireball' } });
    expect(reopened.stats().backend).toBe('file');
  });

  it('expiry survives a restart', async () => {
    await fileStore(() => 0).set('items_monsters', []);
    const later = fileStore(() => 2 * HOUR_MS);
    expect((await later.get('items_monsters')).hit).toBe(false);
  });

  it('treats a corrupt record as a miss', async () => {
    const file = path.join(dir, '_index', 'categories.json');
    await fs.mkdir(path.dirname(file), { recursive: true });
    await fs.writeFile(file, '{not json', 'utf8');

    expect(await fileStore().get('categories')).toEqual({ hit: false });
  });

  it('leaves no temp files behind', async () => {
    const store = fileStore();
    await Promise.all([store.set('items_spells', [1]), store.set('items_spells', [2])]);

    expect(await fs.readdir(path.join(dir, 'spells'))).toEqual(['items_spells.json']);
  });

  it('keeps values intact under concurrent writers and readers on one directory', async () => {
    const writer = fileStore();
    const reader = fileStore();
    const indexes = Array.from({ length: 100 }, (_, i) => i);

    const distinct = indexes.map((i) =>
      (i % 2 === 0 ? writer : reader).set(`item_spells_s${i}`, { index: `s${i}`, n: i }),
    );
    const hot = Array.from({ length: 200 }, (_, i) => i).flatMap((i) => [
      writer.set('item_spells_hot', { i }).then(() => undefined),
      (i % 2 === 0 ? writer : reader).get('item_spells_hot').then((lookup) => {
        if (lookup.hit) expect(lookup.value).toEqual({ i: expect.any(Number) });
      }),
    ]);
    const written = await Promise.all(distinct);
    await Promise.all(hot);

    expect(written.every(Boolean)).toBe(true);

    const reopened = fileStore();
    for (const i of indexes) {
      expect(await reopened.get(`item_spells_s${i}`)).toEqual({ hit: true, value: { index: `s${i}`, n: i } });
    }
    expect(await reopened.get('item_spells_hot')).toEqual({ hit: true, value: { i: 199 } });

    const files = await fs.readdir(path.join(dir, 'spells'));
    expect(files.filter((f) => f.endsWith('.tmp'))).toEqual([]);
    expect(files).toHaveLength(101);
  });

  it('keeps everything in memory when persistence is off', async () => {
    const store = createCacheStore({ ttlHours: 1, persistent: false, backend: 'file', cacheDir: dir });
    await store.set('categories', []);

    expect(store.stats().backend).toBe('memory');
    expect(await fs.readdir(dir)).toEqual([]);
  });

  it('falls back to files when redis is requested without a client', () => {
    const store = createCacheStore({ ttlHours: 1, persistent: true, backend: 'redis', cacheDir: dir });
    expect(store.stats().backend).toBe('file');
  });
});
