/**
 * Relevance search across SRD categories.
 *
 * Each category is listed, pre-filtered by name/index, and the surviving
 * candidates are fetched in full so the scoring rules can look at their
 * details. A category whose listing or any candidate detail fails is left
 * out of the results and reported in `skippedCategories`.
 */

import { RULE_TEXT_CATEGORIES } from '../config/categories';
import { logger } from '../observability/logger';
import { searchDuration } from '../observability/metrics';
import { mapBounded } from '../reference/bounded-pool';
import { ItemFetcher } from '../reference/item-fetcher';
import { CategoryItemSummary, FetchError } from '../reference/types';
import { categoryBoosts, tokenize } from './query-classifier';
import { SCORING_RULES, scoreCandidate } from './scoring-rules';
import { ScoringRule, SearchMatch, SearchOutcome } from './types';

export interface SearchEngineOptions {
  /** Categories to search; defaults to every category the fetcher knows */
  categories?: readonly string[];
  /** Categories searched at once */
  concurrency?: number;
  perCategoryLimit?: number;
  overallLimit?: number;
  rules?: readonly ScoringRule[];
}

type CategoryOutcome =
  | { category: string; ok: true; matches: SearchMatch[] }
  | { category: string; ok: false; error: FetchError };

/** Descending by score; ties keep their incoming order */
export function rankMatches(matches: readonly SearchMatch[]): SearchMatch[] {
  return matches
    .map((match, position) => ({ match, position }))
    .sort((a, b) => b.match.score - a.match.score || a.position - b.position)
    .map(({ match }) => match);
}

export class RelevanceSearchEngine {
  private readonly categories: string[];
  private readonly concurrency: number;
  private readonly perCategoryLimit: number;
  private readonly overallLimit: number;
  private readonly rules: readonly ScoringRule[];
  private readonly log = logger.child({ component: 'search-engine' });

  constructor(
    private readonly fetcher: ItemFetcher,
    options: SearchEngineOptions = {},
  ) {
    const candidates = options.categories ?? fetcher.knownCategories();
    this.categories = candidates.filter((c) => !RULE_TEXT_CATEGORIES.includes(c));
    this.concurrency = Math.max(1, options.concurrency ?? 4);
    this.perCategoryLimit = options.perCategoryLimit ?? 5;
    this.overallLimit = options.overallLimit ?? 5;
    this.rules = options.rules ?? SCORING_RULES;
  }

  searchableCategories(): string[] {
    return [...this.categories];
  }

  async search(query: string): Promise<SearchOutcome> {
    const tokens = tokenize(query);
    const normalized = tokens.join(' ');
    if (tokens.length === 0) {
      return { ok: false, error: { kind: 'invalid_input', message: 'A search query is required.' } };
    }

    const endTimer = searchDuration.startTimer();
    const boosts = categoryBoosts(tokens);

    const outcomes = await mapBounded(this.categories, this.concurrency, (category) =>
      this.searchOne(category, normalized, tokens, boosts.get(category) ?? 0),
    );

    const perCategory: Record<string, SearchMatch[]> = {};
    const skippedCategories: string[] = [];
    const survivors: SearchMatch[] = [];

    for (const outcome of outcomes) {
      if (!outcome.ok) {
        skippedCategories.push(outcome.category);
        continue;
      }
      if (outcome.matches.length === 0) continue;
      const ranked = rankMatches(outcome.matches);
      perCategory[outcome.category] = ranked.slice(0, this.perCategoryLimit);
      survivors.push(...outcome.matches);
    }

    const topOverall = rankMatches(survivors).slice(0, this.overallLimit);
    endTimer();

    this.log.info(
      {
        query: normalized,
        boosted: Array.from(boosts.keys()),
        totalCount: survivors.length,
        skippedCategories,
      },
      'Search completed',
    );

    return {
      ok: true,
      value: { query: normalized, perCategory, topOverall, totalCount: survivors.length, skippedCategories },
    };
  }

  private async searchOne(
    category: string,
    query: string,
    tokens: readonly string[],
    boost: number,
  ): Promise<CategoryOutcome> {
    const list = await this.fetcher.fetchCategoryList(category);
    if (!list.ok) {
      this.log.warn({ category, error: list.error }, 'Search skipped category; listing unavailable');
      return { category, ok: false, error: list.error };
    }

    const candidates = list.value.filter((summary) => preFilter(summary, tokens));
    if (candidates.length === 0) return { category, ok: true, matches: [] };

    const details = await mapBounded(candidates, this.concurrency, (summary) =>
      this.fetcher.fetchItem(category, summary.index),
    );

    const matches: SearchMatch[] = [];
    for (let i = 0; i < candidates.length; i++) {
      const detail = details[i];
      if (!detail.ok) {
        this.log.warn(
          { category, index: candidates[i].index, error: detail.error },
          'Search skipped category; item detail unavailable',
        );
        return { category, ok: false, error: detail.error };
      }

      const summary = candidates[i];
      const score = scoreCandidate(
        {
          query,
          tokens,
          category,
          name: summary.name.toLowerCase(),
          key: summary.index.toLowerCase(),
          detail: detail.value,
          boost,
        },
        this.rules,
      );
      if (score > 0) matches.push({ category, item: summary, score });
    }
    return { category, ok: true, matches };
  }
}

function preFilter(summary: CategoryItemSummary, tokens: readonly string[]): boolean {
  const name = summary.name.toLowerCase();
  const key = summary.index.toLowerCase();
  return tokens.some((token) => name.includes(token) || key.includes(token));
}
