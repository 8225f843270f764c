/**
 * SRD category catalogue.
 *
 * Category names are the upstream API path segments. They never contain `_`,
 * which keeps the cache key namespaces (`items_<category>`, `item_<category>_<index>`) disjoint.
 */

export const CATEGORY_DESCRIPTIONS: Readonly<Record<string, string>> = {
  'ability-scores': "The six abilities that describe a character's physical and mental characteristics",
  alignments: 'The moral and ethical attitudes and behaviors of creatures',
  backgrounds: 'Character backgrounds and their features',
  classes: 'Character classes with features, proficiencies, and subclasses',
  conditions: 'Status conditions that affect creatures',
  'damage-types': 'Types of damage that can be dealt',
  equipment: 'Items, weapons, armor, and gear for adventuring',
  'equipment-categories': 'Categories of equipment',
  feats: 'Special abilities and features',
  features: 'Class and racial features',
  languages: 'Languages spoken throughout the multiverse',
  'magic-items': 'Magical equipment with special properties',
  'magic-schools': 'Schools of magic specialization',
  monsters: 'Creatures and foes',
  proficiencies: 'Skills and tools characters can be proficient with',
  races: 'Character races and their traits',
  'rule-sections': 'Sections of the game rules',
  rules: 'Game rules',
  skills: 'Character skills tied to ability scores',
  spells: 'Magic spells with effects, components, and descriptions',
  subclasses: 'Specializations within character classes',
  subraces: 'Variants of character races',
  traits: 'Racial traits',
  'weapon-properties': 'Special properties of weapons',
};

export const KNOWN_CATEGORIES: readonly string[] = Object.keys(CATEGORY_DESCRIPTIONS);

/** Categories holding long-form rule text; relevance search skips them */
export const RULE_TEXT_CATEGORIES: readonly string[] = ['rules', 'rule-sections'];

export const DEFAULT_PREFETCH_CATEGORIES: readonly string[] = [
  'spells',
  'equipment',
  'monsters',
  'classes',
  'races',
];

export function describeCategory(category: string): string {
  return CATEGORY_DESCRIPTIONS[category] ?? `Collection of D&D 5e ${category}`;
}
