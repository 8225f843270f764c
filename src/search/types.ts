import { CategoryItemSummary, FetchError, ItemDetail } from '../reference/types';

export interface SearchMatch {
  category: string;
  item: CategoryItemSummary;
  score: number;
}

export interface SearchResults {
  query: string;
  /** Ranked, capped matches for each category that produced any */
  perCategory: Record<string, SearchMatch[]>;
  /** Ranked, capped matches across all categories */
  topOverall: SearchMatch[];
  /** All surviving candidates, uncapped */
  totalCount: number;
  /** Categories left out because a fetch failed */
  skippedCategories: string[];
}

export type SearchOutcome = { ok: true; value: SearchResults } | { ok: false; error: FetchError };

/** Everything a scoring rule may look at for one candidate */
export interface ScoringContext {
  /** Trimmed, lower-cased query */
  query: string;
  tokens: readonly string[];
  category: string;
  /** Lower-cased item name */
  name: string;
  /** Lower-cased item index */
  key: string;
  detail?: ItemDetail;
  /** Category priority boost from query classification */
  boost: number;
}

export interface ScoringRule {
  id: string;
  /** Restrict the rule to these categories; all categories when absent */
  appliesTo?: readonly string[];
  score(ctx: ScoringContext): number;
}
