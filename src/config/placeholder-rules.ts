/**
 * Placeholder tokens per license family.
 *
 * Registry license bodies ship with template tokens that the adopter is
 * expected to fill in. Each family lists its tokens in substitution order.
 * Adding a family is a change to this table only.
 */

export type PlaceholderSource = 'year' | 'author' | 'project' | 'company';

export interface PlaceholderRule {
  /** Literal, case-sensitive token as it appears in the license body */
  token: string;
  source: PlaceholderSource;
}

export interface PlaceholderFamily {
  name: string;
  keys: readonly string[];
  rules: readonly PlaceholderRule[];
}

export const PLACEHOLDER_FAMILIES: readonly PlaceholderFamily[] = [
  {
    name: 'gnu',
    keys: ['agpl-3.0', 'gpl-2.0', 'gpl-3.0', 'lgpl-2.1'],
    rules: [
      { token: '<year>', source: 'year' },
      { token: '<name of author>', source: 'author' },
      { token: '<program>', source: 'project' }
    ]
  },
  {
    name: 'apache',
    keys: ['apache-2.0'],
    rules: [
      { token: '[yyyy]', source: 'year' },
      { token: '[name of copyright owner]', source: 'author' }
    ]
  },
  {
    name: 'permissive',
    keys: ['mit', 'bsd-2-clause', 'bsd-3-clause-clear', 'bsd-3-clause'],
    rules: [
      { token: '[year]', source: 'year' },
      { token: '[fullname]', source: 'author' }
    ]
  }
];

const FAMILY_BY_KEY: ReadonlyMap<string, PlaceholderFamily> = new Map(
  PLACEHOLDER_FAMILIES.flatMap(family => family.keys.map(key => [key, family] as const))
);

/**
 * Find the placeholder family for a normalized (lowercase) license key.
 * Returns null for keys without a table entry.
 */
export function getPlaceholderFamily(key: string): PlaceholderFamily | null {
  return FAMILY_BY_KEY.get(key) ?? null;
}
