/**
 * Relevance scoring as an ordered list of rules. A candidate's score is the
 * sum of every applicable rule; each rule is independently testable.
 */

import { ItemDetail, isJsonObject } from '../reference/types';
import { ScoringContext, ScoringRule } from './types';

const EQUIPMENT_CATEGORIES = ['equipment', 'magic-items'] as const;

function countTokensIn(tokens: readonly string[], text: string): number {
  return tokens.filter((token) => text.includes(token)).length;
}

/** Lower-cased description text; `desc` may be a string or a list of paragraphs */
export function descriptionText(detail: ItemDetail): string {
  const desc = detail.desc;
  if (typeof desc === 'string') return desc.toLowerCase();
  if (Array.isArray(desc)) {
    return desc
      .filter((part): part is string => typeof part === 'string')
      .join(' ')
      .toLowerCase();
  }
  return '';
}

/** Lower-cased `name` of a `{ name }` reference field, e.g. `school` or `rarity` */
export function referenceName(detail: ItemDetail, field: string): string {
  const ref = detail[field];
  if (isJsonObject(ref) && typeof ref.name === 'string') return ref.name.toLowerCase();
  return '';
}

/** Lower-cased names of a list of `{ name }` references, e.g. a spell's classes */
export function referenceNames(detail: ItemDetail, field: string): string[] {
  const refs = detail[field];
  if (!Array.isArray(refs)) return [];
  const names: string[] = [];
  for (const ref of refs) {
    if (isJsonObject(ref) && typeof ref.name === 'string') names.push(ref.name.toLowerCase());
  }
  return names;
}

function fieldMatch(ctx: ScoringContext, field: string, weight: number): number {
  if (!ctx.detail) return 0;
  const value = referenceName(ctx.detail, field);
  return value && ctx.tokens.some((token) => value.includes(token)) ? weight : 0;
}

export const exactMatchRule: ScoringRule = {
  id: 'exact-match',
  score: (ctx) => (ctx.query === ctx.name || ctx.query === ctx.key ? 100 : 0),
};

export const nameTokenRule: ScoringRule = {
  id: 'name-token',
  score: (ctx) => 20 * countTokensIn(ctx.tokens, ctx.name),
};

export const keyTokenRule: ScoringRule = {
  id: 'key-token',
  score: (ctx) => 15 * countTokensIn(ctx.tokens, ctx.key),
};

export const allTokensInNameRule: ScoringRule = {
  id: 'all-tokens-in-name',
  score: (ctx) =>
    ctx.tokens.length > 0 && ctx.tokens.every((token) => ctx.name.includes(token)) ? 50 : 0,
};

export const namePrefixRule: ScoringRule = {
  id: 'name-prefix',
  score: (ctx) => (ctx.tokens.some((token) => ctx.name.startsWith(token)) ? 10 : 0),
};

export const descriptionTokenRule: ScoringRule = {
  id: 'description-token',
  score: (ctx) => {
    if (!ctx.detail) return 0;
    const text = descriptionText(ctx.detail);
    return text ? 5 * countTokensIn(ctx.tokens, text) : 0;
  },
};

export const equipmentCategoryRule: ScoringRule = {
  id: 'equipment-category',
  appliesTo: EQUIPMENT_CATEGORIES,
  score: (ctx) => fieldMatch(ctx, 'equipment_category', 10),
};

export const rarityRule: ScoringRule = {
  id: 'rarity',
  appliesTo: EQUIPMENT_CATEGORIES,
  score: (ctx) => fieldMatch(ctx, 'rarity', 10),
};

export const spellSchoolRule: ScoringRule = {
  id: 'spell-school',
  appliesTo: ['spells'],
  score: (ctx) => fieldMatch(ctx, 'school', 10),
};

export const spellClassRule: ScoringRule = {
  id: 'spell-class',
  appliesTo: ['spells'],
  score: (ctx) => {
    if (!ctx.detail) return 0;
    const classes = referenceNames(ctx.detail, 'classes');
    return classes.some((cls) => ctx.tokens.some((token) => cls.includes(token))) ? 15 : 0;
  },
};

export const categoryBoostRule: ScoringRule = {
  id: 'category-boost',
  score: (ctx) => ctx.boost,
};

export const SCORING_RULES: readonly ScoringRule[] = [
  exactMatchRule,
  nameTokenRule,
  keyTokenRule,
  allTokensInNameRule,
  namePrefixRule,
  descriptionTokenRule,
  equipmentCategoryRule,
  rarityRule,
  spellSchoolRule,
  spellClassRule,
  categoryBoostRule,
];

function applies(rule: ScoringRule, category: string): boolean {
  return !rule.appliesTo || rule.appliesTo.includes(category);
}

export function scoreCandidate(ctx: ScoringContext, rules: readonly ScoringRule[] = SCORING_RULES): number {
  let total = 0;
  for (const rule of rules) {
    if (applies(rule, ctx.category)) total += rule.score(ctx);
  }
  return total;
}

