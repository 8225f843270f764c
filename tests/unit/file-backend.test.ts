import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { FileBackend } from '../../src/cache/file-backend';
import { cachePartition } from '../../src/reference/item-fetcher';

describe('FileBackend', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'srd-file-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('lays records out by partition with encoded file names', () => {
    const backend = new FileBackend({ rootDir: dir, partition: cachePartition });

    expect(backend.pathFor('item_magic-items_bag-of-holding')).toBe(
      path.join(dir, 'magic-items', 'item_magic-items_bag-of-holding.json'),
    );
    expect(backend.pathFor('items_spells')).toBe(path.join(dir, 'spells', 'items_spells.json'));
    expect(backend.pathFor('categories')).toBe(path.join(dir, '_index', 'categories.json'));
    expect(backend.pathFor('item_spells_a/b')).toBe(path.join(dir, 'spells', 'item_spells_a%2Fb.json'));
  });

  it('uses a shared partition when none is configured', () => {
    const backend = new FileBackend({ rootDir: dir });
    expect(backend.pathFor('anything')).toBe(path.join(dir, '_misc', 'anything.json'));
  });

  it('never lets a partition escape the root', () => {
    const backend = new FileBackend({ rootDir: dir, partition: () => '..' });
    expect(backend.pathFor('k')).toBe(path.join(dir, '_misc', 'k.json'));
  });

  it('reads back what it wrote and returns null for missing keys', async () => {
    const backend = new FileBackend({ rootDir: dir, partition: cachePartition });

    expect(await backend.readRaw('items_spells')).toBeNull();
    await backend.writeRaw('items_spells', '{"a":1}');
    expect(await backend.readRaw('items_spells')).toBe('{"a":1}');
  });

  it('overwrites in place', async () => {
    const backend = new FileBackend({ rootDir: dir, partition: cachePartition });
    await backend.writeRaw('items_spells', 'one');
    await backend.writeRaw('items_spells', 'two');

    expect(await backend.readRaw('items_spells')).toBe('two');
    expect(await fs.readdir(path.join(dir, 'spells'))).toEqual(['items_spells.json']);
  });

  it('creates the root directory on ping', async () => {
    const root = path.join(dir, 'nested', 'cache');
    await new FileBackend({ rootDir: root }).ping();
    expect((await fs.stat(root)).isDirectory()).toBe(true);
  });
});
