import { CacheStore } from '../../cache/types';
import { ItemFetcher } from '../../reference/item-fetcher';
import { UpstreamClient } from '../../reference/upstream-client';
import { FetchResult } from '../../reference/types';
import { RelevanceSearchEngine } from '../../search/search-engine';
import { ToolResult } from '../types';

/** Everything the reference tools reach into */
export interface ToolDeps {
  fetcher: ItemFetcher;
  searchEngine: RelevanceSearchEngine;
  upstream: UpstreamClient;
  cache: CacheStore;
}

/** FetchResult -> ToolResult, keeping the error class */
export function toToolResult<T, D>(result: FetchResult<T>, shape: (value: T) => D): ToolResult {
  if (!result.ok) {
    return { success: false, error: result.error.message, errorKind: result.error.kind };
  }
  return { success: true, data: shape(result.value) };
}

export function stringArg(args: Record<string, unknown>, name: string): string {
  const value = args[name];
  return typeof value === 'string' ? value : '';
}
