/**
 * Fetch-through-cache accessor for SRD categories and items.
 *
 * Owns cache key construction so the cache store stays free of domain
 * knowledge. Every operation resolves to a FetchResult; nothing throws.
 */

import { CacheStore } from '../cache/types';
import { KNOWN_CATEGORIES, describeCategory } from '../config/categories';
import { logger } from '../observability/logger';
import { InflightDedup } from './inflight-dedup';
import { UpstreamClient } from './upstream-client';
import {
  CategoryIndexEntry,
  CategoryItemSummary,
  FetchError,
  FetchResult,
  ItemDetail,
  isJsonObject,
} from './types';

export const RESOURCE_URI_PREFIX = 'resource://srd';

// ───── Cache keys ───────────────────────────────────────────────

export const CATEGORY_INDEX_KEY = 'categories';

export function categoryListKey(category: string): string {
  return `items_${category}`;
}

export function itemKey(category: string, index: string): string {
  return `item_${category}_${index}`;
}

/** File-backend partition for a key: its category, or `_index` for the root listing */
export function cachePartition(key: string): string {
  if (key.startsWith('items_')) return key.slice('items_'.length);
  if (key.startsWith('item_')) {
    const rest = key.slice('item_'.length);
    const sep = rest.indexOf('_');
    return sep === -1 ? rest : rest.slice(0, sep);
  }
  return '_index';
}

export function itemUri(category: string, index: string): string {
  return `${RESOURCE_URI_PREFIX}/item/${category}/${index}`;
}

/** "Magic Missile" -> "magic-missile" */
export function slugify(name: string): string {
  return name.trim().toLowerCase().replace(/\s+/g, '-');
}

/** A single path segment: no `/` and not a dot segment */
export function isPlainIndex(index: string): boolean {
  return index !== '.' && index !== '..' && !index.includes('/');
}

// ───── Fetcher ──────────────────────────────────────────────────

export interface ItemFetcherOptions {
  cache: CacheStore;
  upstream: UpstreamClient;
  /** Categories callers may address; defaults to the SRD catalogue */
  categories?: readonly string[];
}

export class ItemFetcher {
  private readonly cache: CacheStore;
  private readonly upstream: UpstreamClient;
  private readonly categories: ReadonlySet<string>;
  private readonly indexDedup = new InflightDedup<FetchResult<CategoryIndexEntry[]>>();
  private readonly listDedup = new InflightDedup<FetchResult<CategoryItemSummary[]>>();
  private readonly itemDedup = new InflightDedup<FetchResult<ItemDetail>>();
  private readonly log = logger.child({ component: 'item-fetcher' });

  constructor(options: ItemFetcherOptions) {
    this.cache = options.cache;
    this.upstream = options.upstream;
    this.categories = new Set(options.categories ?? KNOWN_CATEGORIES);
  }

  knownCategories(): string[] {
    return Array.from(this.categories);
  }

  async fetchCategoryIndex(): Promise<FetchResult<CategoryIndexEntry[]>> {
    const cached = await this.readCached(CATEGORY_INDEX_KEY, decodeCategoryIndex);
    if (cached) return { ok: true, value: cached, source: 'cache' };
    return this.indexDedup.run(CATEGORY_INDEX_KEY, () => this.loadCategoryIndex());
  }

  async fetchCategoryList(category: string): Promise<FetchResult<CategoryItemSummary[]>> {
    const invalid = this.checkCategory(category);
    if (invalid) return { ok: false, error: invalid };

    const key = categoryListKey(category);
    const cached = await this.readCached(key, decodeSummaries);
    if (cached) return { ok: true, value: cached, source: 'cache' };
    return this.listDedup.run(key, () => this.loadCategoryList(category, key));
  }

  async fetchItem(category: string, index: string): Promise<FetchResult<ItemDetail>> {
    const invalid = this.checkCategory(category);
    if (invalid) return { ok: false, error: invalid };

    const trimmed = index.trim();
    if (!trimmed) {
      return { ok: false, error: { kind: 'invalid_input', message: 'An item index is required.' } };
    }
    if (!isPlainIndex(trimmed)) {
      return { ok: false, error: { kind: 'invalid_input', message: `Invalid item index '${trimmed}'.` } };
    }

    const key = itemKey(category, trimmed);
    const cached = await this.readCached(key, decodeItemDetail);
    if (cached) return { ok: true, value: cached, source: 'cache' };
    return this.itemDedup.run(key, () => this.loadItem(category, trimmed, key));
  }

  async isItemCached(category: string, index: string): Promise<boolean> {
    const trimmed = index.trim();
    if (!trimmed || !isPlainIndex(trimmed)) return false;
    return this.cache.has(itemKey(category, trimmed));
  }

  /**
   * Resolve an item by display name: slug first, then a name match
   * against the category listing (exact before substring).
   */
  async lookupByName(category: string, name: string): Promise<FetchResult<ItemDetail>> {
    const trimmed = name.trim();
    if (!trimmed) {
      return { ok: false, error: { kind: 'invalid_input', message: 'A name is required.' } };
    }

    const slug = slugify(trimmed);
    const direct = await this.fetchItem(category, slug);
    if (direct.ok || direct.error.kind !== 'not_found') return direct;

    const list = await this.fetchCategoryList(category);
    if (!list.ok) return direct;

    const needle = trimmed.toLowerCase();
    const match =
      list.value.find((s) => s.name.toLowerCase() === needle) ??
      list.value.find((s) => s.name.toLowerCase().includes(needle));

    if (!match) {
      return {
        ok: false,
        error: { kind: 'not_found', message: `No ${category} entry matches '${trimmed}'.` },
      };
    }
    if (match.index === slug) return direct;

    this.log.debug({ category, name: trimmed, index: match.index }, 'Resolved name via category listing');
    return this.fetchItem(category, match.index);
  }

  /** Case-insensitive name filter over a category listing */
  async searchCategory(category: string, query: string): Promise<FetchResult<CategoryItemSummary[]>> {
    const needle = query.trim().toLowerCase();
    if (!needle) {
      return { ok: false, error: { kind: 'invalid_input', message: 'A search query is required.' } };
    }

    const list = await this.fetchCategoryList(category);
    if (!list.ok) return list;
    return {
      ok: true,
      value: list.value.filter((s) => s.name.toLowerCase().includes(needle)),
      source: list.source,
    };
  }

  // ───── Loaders (cache miss path) ────────────────────────────────

  private async loadCategoryIndex(): Promise<FetchResult<CategoryIndexEntry[]>> {
    const res = await this.upstream.getJson('/');
    if (!res.ok) {
      this.log.warn({ error: res.error }, 'Failed to fetch category index');
      return { ok: false, error: res.error };
    }
    if (!isJsonObject(res.body)) {
      return { ok: false, error: { kind: 'malformed', message: 'Category index is not a JSON object' } };
    }

    const entries = Object.keys(res.body).map((name) => ({
      name,
      description: describeCategory(name),
      uri: `${RESOURCE_URI_PREFIX}/items/${name}`,
    }));
    await this.cache.set(CATEGORY_INDEX_KEY, entries);
    return { ok: true, value: entries, source: 'upstream' };
  }

  private async loadCategoryList(
    category: string,
    key: string,
  ): Promise<FetchResult<CategoryItemSummary[]>> {
    const res = await this.upstream.getJson(`/${encodeURIComponent(category)}`);
    if (!res.ok) {
      this.log.warn({ category, error: res.error }, 'Failed to fetch category list');
      const error: FetchError =
        res.error.kind === 'not_found'
          ? { ...res.error, message: `Category '${category}' not found` }
          : res.error;
      return { ok: false, error };
    }

    const summaries = decodeListResponse(res.body, category);
    if (!summaries) {
      this.log.warn({ category }, 'Category list response has no results array');
      return { ok: false, error: { kind: 'malformed', message: `Unexpected list payload for '${category}'` } };
    }

    await this.cache.set(key, summaries);
    this.log.debug({ category, count: summaries.length }, 'Category list cached');
    return { ok: true, value: summaries, source: 'upstream' };
  }

  private async loadItem(category: string, index: string, key: string): Promise<FetchResult<ItemDetail>> {
    const res = await this.upstream.getJson(`/${encodeURIComponent(category)}/${encodeURIComponent(index)}`);
    if (!res.ok) {
      const error: FetchError =
        res.error.kind === 'not_found'
          ? { ...res.error, message: `Item '${index}' not found in category '${category}'` }
          : res.error;
      if (error.kind === 'not_found') {
        this.log.debug({ category, index }, 'Item not found upstream');
      } else {
        this.log.warn({ category, index, error }, 'Failed to fetch item');
      }
      return { ok: false, error };
    }

    if (!isJsonObject(res.body)) {
      this.log.warn({ category, index }, 'Item payload is not a JSON object');
      return { ok: false, error: { kind: 'malformed', message: `Unexpected payload for '${category}/${index}'` } };
    }

    await this.cache.set(key, res.body);
    return { ok: true, value: res.body, source: 'upstream' };
  }

  private async readCached<T>(key: string, decode: (value: unknown) => T | undefined): Promise<T | undefined> {
    const lookup = await this.cache.get(key);
    if (!lookup.hit) return undefined;
    const decoded = decode(lookup.value);
    if (decoded === undefined) {
      this.log.warn({ key }, 'Cached value has unexpected shape; refetching');
    }
    return decoded;
  }

  private checkCategory(category: string): FetchError | undefined {
    if (this.categories.has(category)) return undefined;
    return {
      kind: 'invalid_input',
      message: `Unknown category '${category}'. Valid options are: ${Array.from(this.categories).join(', ')}`,
    };
  }
}

// ───── Decoders ─────────────────────────────────────────────────

function decodeListResponse(body: unknown, category: string): CategoryItemSummary[] | undefined {
  if (!isJsonObject(body) || !Array.isArray(body.results)) return undefined;
  const summaries: CategoryItemSummary[] = [];
  for (const entry of body.results) {
    if (!isJsonObject(entry) || typeof entry.index !== 'string' || !entry.index) continue;
    const index = entry.index;
    summaries.push({
      name: typeof entry.name === 'string' && entry.name ? entry.name : index,
      index,
      uri: itemUri(category, index),
    });
  }
  return summaries;
}

function decodeSummaries(value: unknown): CategoryItemSummary[] | undefined {
  if (!Array.isArray(value)) return undefined;
  const summaries: CategoryItemSummary[] = [];
  for (const entry of value) {
    if (
      !isJsonObject(entry) ||
      typeof entry.name !== 'string' ||
      typeof entry.index !== 'string' ||
      typeof entry.uri !== 'string'
    ) {
      return undefined;
    }
    summaries.push({ name: entry.name, index: entry.index, uri: entry.uri });
  }
  return summaries;
}

function decodeCategoryIndex(value: unknown): CategoryIndexEntry[] | undefined {
  if (!Array.isArray(value)) return undefined;
  const entries: CategoryIndexEntry[] = [];
  for (const entry of value) {
    if (
      !isJsonObject(entry) ||
      typeof entry.name !== 'string' ||
      typeof entry.description !== 'string' ||
      typeof entry.uri !== 'string'
    ) {
      return undefined;
    }
    entries.push({ name: entry.name, description: entry.description, uri: entry.uri });
  }
  return entries;
}

function decodeItemDetail(value: unknown): ItemDetail | undefined {
  return isJsonObject(value) ? value : undefined;
}
