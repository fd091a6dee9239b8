/**
 * Line Item Matcher
 *
 * Aligns expected and actual line items before their sub-fields are graded.
 * Extracted item lists come back in arbitrary order, with items missing or
 * invented, so positions cannot be compared directly.
 *
 * Flow:
 * 1. Handle empty lists (nothing to align)
 * 2. Pair items: greedy rule-based matching, or an injected external matcher
 * 3. Re-sequence both lists so each pair shares an index
 *
 * Rule-based pairing is greedy and expected-order-first: each expected item
 * takes the best unused actual item, earliest index winning ties. It is not a
 * globally optimal assignment; earlier expected items get first pick.
 */

import { AppError } from '../utils/AppError';
import { Logging } from '../utils/logger';
import {
  DEFAULT_FIELD_WEIGHT,
  DEFAULT_ITEM_FIELD_WEIGHTS,
  ITEMS_FIELD,
  ITEMS_METRIC_BASE_WEIGHT,
  ITEMS_METRIC_PASS_THRESHOLD,
} from './constants';
import {
  formatItemForMatching,
  NO_MATCH_INDEX,
  parseExternalMatches,
  sanitizeExternalMatches,
} from './externalMatcher';
import { calculateItemSimilarity } from './itemSimilarity';
import { validateWeightTable } from './weights';
import type { SimilarityWeights } from './itemSimilarity';
import type {
  AlignedItems,
  ExternalMatcher,
  ExternalMatchTriple,
  ExtractionRecord,
  FieldValue,
  ItemMatch,
  ItemRecord,
  ItemSimilarity,
  ItemsMatchResult,
  ItemsMetric,
  WeightTable,
} from './types';

export interface ItemMatcherOptions {
  /** Sub-field weights keyed without the `items.` prefix */
  fieldWeights?: WeightTable;
  /** Weight for sub-fields missing from `fieldWeights` */
  defaultWeight?: number;
  /** Optional pairing capability used instead of the rule-based matcher */
  externalMatcher?: ExternalMatcher;
}

// ============================================
// Helpers
// ============================================

function isItemRecord(value: FieldValue): value is ItemRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Reads the line-item list from a record. A missing or non-list value is an
 * empty list; entries that are not maps are skipped.
 */
export function extractItems(record: ExtractionRecord): ItemRecord[] {
  const value = Object.prototype.hasOwnProperty.call(record, ITEMS_FIELD)
    ? record[ITEMS_FIELD]
    : null;
  if (!Array.isArray(value)) {
    return [];
  }
  return value.filter(isItemRecord);
}

function unmatched(expectedItem: ItemRecord, matchReason?: string): ItemMatch {
  return {
    expectedItem,
    matchedItem: null,
    matchedIndex: null,
    matchScore: 0,
    fieldMatches: {},
    ...(matchReason !== undefined ? { matchReason } : {}),
  };
}

function toExternalMatcherError(error: unknown): AppError {
  if (error instanceof AppError && error.code === 'EXTERNAL_MATCHER_ERROR') {
    return error;
  }

  const failure = AppError.externalMatcher(error instanceof Error ? error.message : String(error));
  if (error instanceof Error && error.stack) {
    failure.stack = error.stack;
  }
  return failure;
}

function meanScore(matches: readonly ItemMatch[]): number {
  if (matches.length === 0) {
    return 0;
  }
  return matches.reduce((sum, match) => sum + match.matchScore, 0) / matches.length;
}

function sortKeys(value: FieldValue): FieldValue {
  if (Array.isArray(value)) {
    return value.map(sortKeys);
  }
  if (isItemRecord(value)) {
    const sorted: Record<string, FieldValue> = {};
    for (const key of Object.keys(value).sort()) {
      sorted[key] = sortKeys(value[key]);
    }
    return sorted;
  }
  return value;
}

/**
 * Re-sequences two item lists so that each matched pair shares an index.
 * Unmatched expected items follow (paired with `{}`), then unmatched actual
 * items (paired with `{}`).
 *
 * @example
 * // matches: E0 ↔ A1, E1 unmatched; actual: [A0, A1]
 * // Returns: expected [E0, E1, {}], actual [A1, {}, A0]
 */
export function reorderItems(
  matches: readonly ItemMatch[],
  actualItems: readonly ItemRecord[]
): AlignedItems {
  const aligned: AlignedItems = { expected: [], actual: [], pairScores: [] };
  const unmatchedExpected: ItemRecord[] = [];
  const usedActual = new Set<number>();

  for (const match of matches) {
    if (match.matchedItem === null || match.matchedIndex === null) {
      unmatchedExpected.push(match.expectedItem);
      continue;
    }
    aligned.expected.push(match.expectedItem);
    aligned.actual.push(match.matchedItem);
    aligned.pairScores.push(match.matchScore);
    usedActual.add(match.matchedIndex);
  }

  for (const expectedItem of unmatchedExpected) {
    aligned.expected.push(expectedItem);
    aligned.actual.push({});
    aligned.pairScores.push(0);
  }

  actualItems.forEach((actualItem, index) => {
    if (usedActual.has(index)) return;
    aligned.expected.push({});
    aligned.actual.push(actualItem);
    aligned.pairScores.push(0);
  });

  return aligned;
}

// ============================================
// Matcher
// ============================================

export class ItemMatcher {
  private readonly weights: SimilarityWeights;
  private readonly externalMatcher?: ExternalMatcher;

  /**
   * @throws AppError (CONFIGURATION_ERROR) for a negative or non-finite weight
   */
  constructor(options: ItemMatcherOptions = {}) {
    const fieldWeights = { ...(options.fieldWeights ?? DEFAULT_ITEM_FIELD_WEIGHTS) };
    const defaultWeight = options.defaultWeight ?? DEFAULT_FIELD_WEIGHT;
    validateWeightTable(fieldWeights, defaultWeight);

    this.weights = { fieldWeights, defaultWeight };
    this.externalMatcher = options.externalMatcher;
  }

  get usesExternalMatcher(): boolean {
    return this.externalMatcher !== undefined;
  }

  calculateSimilarity(expectedItem: ItemRecord, actualItem: ItemRecord): ItemSimilarity {
    return calculateItemSimilarity(expectedItem, actualItem, this.weights);
  }

  /**
   * Greedy rule-based matching. Always synchronous; ignores any external matcher.
   */
  matchWithRules(expectedItems: ItemRecord[], actualItems: ItemRecord[]): ItemsMatchResult {
    const edgeCase = this.matchEdgeCases(expectedItems, actualItems);
    if (edgeCase) {
      return edgeCase;
    }

    const usedIndices = new Set<number>();
    const matches = expectedItems.map((expectedItem) => {
      const match = this.findBestMatch(expectedItem, actualItems, usedIndices);
      if (match.matchedIndex !== null) {
        usedIndices.add(match.matchedIndex);
      }
      return match;
    });

    return { overallScore: meanScore(matches), matches };
  }

  /**
   * Matches two item lists, delegating pairing to the external matcher when
   * one is configured.
   *
   * @returns Overall score (mean of per-item scores) and one match per expected item
   */
  async calculateItemsAccuracy(
    expectedItems: ItemRecord[],
    actualItems: ItemRecord[]
  ): Promise<ItemsMatchResult> {
    const edgeCase = this.matchEdgeCases(expectedItems, actualItems);
    if (edgeCase) {
      return edgeCase;
    }

    if (this.externalMatcher) {
      return this.matchWithExternal(this.externalMatcher, expectedItems, actualItems);
    }

    return this.matchWithRules(expectedItems, actualItems);
  }

  async matchItems(expectedItems: ItemRecord[], actualItems: ItemRecord[]): Promise<ItemMatch[]> {
    const { matches } = await this.calculateItemsAccuracy(expectedItems, actualItems);
    return matches;
  }

  /** Matches, then re-sequences both lists so aligned pairs share an index. */
  async alignItems(expectedItems: ItemRecord[], actualItems: ItemRecord[]): Promise<AlignedItems> {
    const { overallScore, matches } = await this.calculateItemsAccuracy(expectedItems, actualItems);
    const aligned = reorderItems(matches, actualItems);

    Logging.debug(
      `Aligned ${expectedItems.length} expected / ${actualItems.length} actual items into ` +
        `${aligned.expected.length} pairs (score ${overallScore.toFixed(3)})`
    );

    return aligned;
  }

  /**
   * Returns copies of both records with their `items` lists re-sequenced.
   * Records without items on either side are returned unchanged.
   */
  async processMatchedItems(
    expectedRecord: ExtractionRecord,
    actualRecord: ExtractionRecord
  ): Promise<[ExtractionRecord, ExtractionRecord]> {
    const expectedItems = extractItems(expectedRecord);
    const actualItems = extractItems(actualRecord);

    if (expectedItems.length === 0 && actualItems.length === 0) {
      return [expectedRecord, actualRecord];
    }

    const aligned = await this.alignItems(expectedItems, actualItems);
    return [
      { ...expectedRecord, [ITEMS_FIELD]: aligned.expected },
      { ...actualRecord, [ITEMS_FIELD]: aligned.actual },
    ];
  }

  /**
   * Summarizes item matching as one list-level metric.
   * The list counts as correct at 80% accuracy or above.
   */
  async createItemsMetric(
    expectedItems: ItemRecord[],
    actualItems: ItemRecord[],
    baseWeight: number = ITEMS_METRIC_BASE_WEIGHT
  ): Promise<ItemsMetric> {
    const { overallScore, matches } = await this.calculateItemsAccuracy(expectedItems, actualItems);

    return {
      field_name: ITEMS_FIELD,
      expected_value: JSON.stringify(sortKeys(expectedItems)),
      actual_value: JSON.stringify(sortKeys(actualItems)),
      weight: baseWeight,
      is_correct: overallScore >= ITEMS_METRIC_PASS_THRESHOLD,
      field_score: baseWeight * overallScore,
      items_accuracy: overallScore,
      items_matches: matches.map((match) => ({
        expected: match.expectedItem,
        matched: match.matchedItem,
        score: match.matchScore,
        field_matches: { ...match.fieldMatches },
        reason: match.matchReason ?? null,
      })),
    };
  }

  // ============================================
  // Internals
  // ============================================

  private matchEdgeCases(
    expectedItems: ItemRecord[],
    actualItems: ItemRecord[]
  ): ItemsMatchResult | null {
    if (expectedItems.length === 0) {
      // Nothing expected: perfect only if nothing was extracted either
      return { overallScore: actualItems.length === 0 ? 1 : 0, matches: [] };
    }

    if (actualItems.length === 0) {
      return { overallScore: 0, matches: expectedItems.map((item) => unmatched(item)) };
    }

    return null;
  }

  private findBestMatch(
    expectedItem: ItemRecord,
    actualItems: ItemRecord[],
    usedIndices: ReadonlySet<number>
  ): ItemMatch {
    let best: ItemMatch = unmatched(expectedItem);

    actualItems.forEach((actualItem, index) => {
      if (usedIndices.has(index)) return;

      const { score, fieldMatches } = this.calculateSimilarity(expectedItem, actualItem);

      // Strictly greater: the earliest actual item wins ties, and score 0 never matches
      if (score > best.matchScore) {
        best = {
          expectedItem,
          matchedItem: actualItem,
          matchedIndex: index,
          matchScore: score,
          fieldMatches,
        };
      }
    });

    return best;
  }

  private async matchWithExternal(
    externalMatcher: ExternalMatcher,
    expectedItems: ItemRecord[],
    actualItems: ItemRecord[]
  ): Promise<ItemsMatchResult> {
    let triples: ExternalMatchTriple[];

    try {
      const output: unknown = await externalMatcher({
        expectedItems,
        actualItems,
        expectedDescriptions: expectedItems.map(formatItemForMatching),
        actualDescriptions: actualItems.map(formatItemForMatching),
      });
      triples = parseExternalMatches(output);
    } catch (error) {
      const failure = toExternalMatcherError(error);
      Logging.error(
        `External item matcher failed; treating all ${expectedItems.length} expected items as unmatched: ` +
          failure.message,
        failure
      );
      return {
        overallScore: 0,
        matches: expectedItems.map((item) => unmatched(item, 'external matcher failed')),
      };
    }

    const matches = sanitizeExternalMatches(triples, expectedItems.length, actualItems.length).map(
      ([expectedIndex, actualIndex, confidence]): ItemMatch => {
        const expectedItem = expectedItems[expectedIndex];

        if (actualIndex === NO_MATCH_INDEX) {
          return unmatched(expectedItem, 'no corresponding item');
        }

        const actualItem = actualItems[actualIndex];
        return {
          expectedItem,
          matchedItem: actualItem,
          matchedIndex: actualIndex,
          matchScore: confidence,
          fieldMatches: this.calculateSimilarity(expectedItem, actualItem).fieldMatches,
          matchReason: `external confidence: ${confidence.toFixed(2)}`,
        };
      }
    );

    return { overallScore: meanScore(matches), matches };
  }
}

export default ItemMatcher;
