import { getPlaceholderFamily, type PlaceholderFamily, type PlaceholderRule, type PlaceholderSource } from '../config/placeholder-rules.js';

export type PlaceholderValues = Record<PlaceholderSource, string>;

export interface RenderedLicense {
  text: string;
  /** Placeholder family applied, null when the key has no table entry */
  family: PlaceholderFamily | null;
}

/**
 * Replace every occurrence of each rule's token, in rule order.
 * Tokens are matched literally; replacement values are inserted as-is
 * (a `$&` in an author name stays `$&`). Empty values erase the token.
 */
export function replacePlaceholders(
  body: string,
  rules: readonly PlaceholderRule[],
  values: PlaceholderValues
): string {
  let text = body;
  for (const { token, source } of rules) {
    const value = values[source];
    text = text.replaceAll(token, () => value);
  }
  return text;
}

/**
 * Fill in the placeholders of a license body for a normalized (lowercase) license key.
 * Keys without a placeholder family come back unmodified.
 */
export function renderLicense(key: string, body: string, values: PlaceholderValues): RenderedLicense {
  const family = getPlaceholderFamily(key);
  if (!family) {
    return { text: body, family: null };
  }
  return { text: replacePlaceholders(body, family.rules, values), family };
}
