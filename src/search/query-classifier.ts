/**
 * Query tokenisation and classification.
 *
 * A query whose tokens overlap a class vocabulary boosts that class's
 * categories. When several classes apply, each category keeps its largest boost.
 */

export interface QueryClass {
  id: 'magic-item' | 'spell' | 'monster';
  vocabulary: ReadonlySet<string>;
  /** category -> score boost */
  boosts: Readonly<Record<string, number>>;
}

export const QUERY_CLASSES: readonly QueryClass[] = [
  {
    id: 'magic-item',
    vocabulary: new Set([
      'magic', 'magical', 'item', 'items', 'wondrous', 'artifact', 'attunement',
      'ring', 'wand', 'staff', 'rod', 'potion', 'amulet', 'cloak', 'boots',
      'uncommon', 'rare', 'legendary',
    ]),
    boosts: { 'magic-items': 10, equipment: 5 },
  },
  {
    id: 'spell',
    vocabulary: new Set([
      'spell', 'spells', 'cast', 'casting', 'cantrip', 'cantrips', 'ritual', 'incantation',
      'abjuration', 'conjuration', 'divination', 'enchantment', 'evocation',
      'illusion', 'necromancy', 'transmutation',
    ]),
    boosts: { spells: 10, 'magic-schools': 5 },
  },
  {
    id: 'monster',
    vocabulary: new Set([
      'monster', 'monsters', 'creature', 'creatures', 'beast', 'beasts', 'dragon',
      'undead', 'fiend', 'demon', 'devil', 'giant', 'aberration', 'elemental',
      'ooze', 'construct',
    ]),
    boosts: { monsters: 10, races: 5 },
  },
];

/** Lower-cased whitespace tokens, empties dropped */
export function tokenize(query: string): string[] {
  return query
    .trim()
    .toLowerCase()
    .split(/\s+/)
    .filter((token) => token.length > 0);
}

export function classifyQuery(
  tokens: readonly string[],
  classes: readonly QueryClass[] = QUERY_CLASSES,
): QueryClass[] {
  return classes.filter((cls) => tokens.some((token) => cls.vocabulary.has(token)));
}

export function categoryBoosts(
  tokens: readonly string[],
  classes: readonly QueryClass[] = QUERY_CLASSES,
): Map<string, number> {
  const boosts = new Map<string, number>();
  for (const cls of classifyQuery(tokens, classes)) {
    for (const [category, boost] of Object.entries(cls.boosts)) {
      boosts.set(category, Math.max(boosts.get(category) ?? 0, boost));
    }
  }
  return boosts;
}
