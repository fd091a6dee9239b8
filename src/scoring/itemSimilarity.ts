/**
 * Line Item Similarity
 *
 * Weighted agreement between two line items over the union of their fields.
 *
 * Scoring logic:
 * - Both values empty (null, "" or 0): counted as a match, weight left out
 *   of the denominator so absent data neither helps nor hurts
 * - Name field: layered name heuristic
 * - Other fields: numeric comparison (tolerance 0.01) when both sides read
 *   as numbers, otherwise trimmed case-insensitive text equality
 *
 * similarity = matched weight / compared weight (0 when nothing was compared)
 */

import { AMOUNT_TOLERANCE, DEFAULT_FIELD_WEIGHT, NAME_FIELD } from './constants';
import { isNameMatch } from './nameMatcher';
import { isEmptyValue, normalizeText, parseLooseNumber, readField } from './valueNormalizer';
import { lookupWeight } from './weights';
import type { FieldValue, ItemRecord, ItemSimilarity, WeightTable } from './types';

export interface SimilarityWeights {
  /** Sub-field weights, keyed without the `items.` prefix */
  fieldWeights: Readonly<WeightTable>;
  defaultWeight: number;
}

/**
 * Union of field names, expected-side order first.
 */
export function unionKeys(...records: ReadonlyArray<Record<string, unknown>>): string[] {
  const keys = new Set<string>();
  for (const record of records) {
    for (const key of Object.keys(record)) keys.add(key);
  }
  return [...keys];
}

/**
 * Compares two non-name item values.
 *
 * @example
 * isItemValueMatch("1,200", 1200)  // Returns: true
 * isItemValueMatch(" PCS ", "pcs") // Returns: true
 */
export function isItemValueMatch(expected: FieldValue, actual: FieldValue): boolean {
  if (isEmptyValue(expected) && isEmptyValue(actual)) {
    return true;
  }
  if (expected === null || actual === null) {
    return false;
  }

  const expectedNumber = parseLooseNumber(expected);
  const actualNumber = parseLooseNumber(actual);
  if (expectedNumber !== null && actualNumber !== null) {
    return Math.abs(expectedNumber - actualNumber) < AMOUNT_TOLERANCE;
  }

  return normalizeText(expected) === normalizeText(actual);
}

/**
 * Calculates the weighted similarity between two line items.
 *
 * @returns Score in [0, 1] and per-field agreement
 *
 * @example
 * calculateItemSimilarity(
 *   { name: 'Bolt', quantity: 10, note: '' },
 *   { name: 'bolt', quantity: 12, note: null },
 *   { fieldWeights: { name: 3, quantity: 2 }, defaultWeight: 1 }
 * )
 * // Returns: { score: 0.6, fieldMatches: { name: true, quantity: false, note: true } }
 */
export function calculateItemSimilarity(
  expectedItem: ItemRecord,
  actualItem: ItemRecord,
  weights: SimilarityWeights
): ItemSimilarity {
  let totalWeight = 0;
  let matchedWeight = 0;
  const fieldMatches: Record<string, boolean> = {};

  for (const field of unionKeys(expectedItem, actualItem)) {
    const weight = lookupWeight(weights.fieldWeights, field, weights.defaultWeight);
    const expectedValue = readField(expectedItem, field);
    const actualValue = readField(actualItem, field);

    if (isEmptyValue(expectedValue) && isEmptyValue(actualValue)) {
      fieldMatches[field] = true;
      continue;
    }

    totalWeight += weight;

    const isMatch =
      field === NAME_FIELD
        ? isNameMatch(expectedValue, actualValue)
        : isItemValueMatch(expectedValue, actualValue);

    fieldMatches[field] = isMatch;
    if (isMatch) {
      matchedWeight += weight;
    }
  }

  return {
    score: totalWeight > 0 ? matchedWeight / totalWeight : 0,
    fieldMatches,
  };
}

export const DEFAULT_SIMILARITY_WEIGHTS: SimilarityWeights = {
  fieldWeights: {},
  defaultWeight: DEFAULT_FIELD_WEIGHT,
};
