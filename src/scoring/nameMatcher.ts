/**
 * Item Name Matching
 *
 * Extracted item names are often abbreviated, extended or written with
 * different kana marks ("ポンプ" read back as "ホンプ"). Names are compared
 * with a layered heuristic, stopping at the first check that succeeds:
 *
 * 1. Exact normalized equality
 * 2. Substring containment either way
 * 3. Containment after stripping diacritic and kana voicing marks
 * 4. Shared-word ratio ≥ 0.5 (words split on whitespace, "-" and "_")
 */

import { NAME_TOKEN_OVERLAP_THRESHOLD } from './constants';
import { normalizeForNameMatch, normalizeText } from './valueNormalizer';
import type { FieldValue } from './types';

function containsEitherWay(a: string, b: string): boolean {
  return a.includes(b) || b.includes(a);
}

/**
 * Splits a name into its distinct words.
 *
 * @example
 * tokenizeName("motor-unit  assembly_kit") // Returns: Set { "motor", "unit", "assembly", "kit" }
 */
export function tokenizeName(name: string): Set<string> {
  return new Set(name.split(/[\s\-_]+/).filter((word) => word.length > 0));
}

/**
 * Shared words divided by the word count of the shorter name.
 * Returns 0 when either name has no words.
 *
 * @example
 * calculateTokenOverlap("steel bolt m8", "bolt steel") // Returns: 1
 * calculateTokenOverlap("motor cover", "pump housing") // Returns: 0
 */
export function calculateTokenOverlap(a: string, b: string): number {
  const wordsA = tokenizeName(a);
  const wordsB = tokenizeName(b);

  if (wordsA.size === 0 || wordsB.size === 0) {
    return 0;
  }

  let common = 0;
  for (const word of wordsA) {
    if (wordsB.has(word)) common += 1;
  }

  return common / Math.min(wordsA.size, wordsB.size);
}

/**
 * Whether two item names refer to the same item.
 * A null name never matches; a blank name is contained in any name.
 *
 * @example
 * isNameMatch("モータ", "ホンプモータユニット") // Returns: true (containment)
 * isNameMatch("ポンプ", "ホンプ")             // Returns: true (voicing mark stripped)
 */
export function isNameMatch(expected: FieldValue, actual: FieldValue): boolean {
  if (expected === null || actual === null) {
    return false;
  }

  const expectedText = normalizeText(expected);
  const actualText = normalizeText(actual);

  if (expectedText === actualText) {
    return true;
  }

  if (containsEitherWay(expectedText, actualText)) {
    return true;
  }

  if (containsEitherWay(normalizeForNameMatch(expected), normalizeForNameMatch(actual))) {
    return true;
  }

  return calculateTokenOverlap(expectedText, actualText) >= NAME_TOKEN_OVERLAP_THRESHOLD;
}
