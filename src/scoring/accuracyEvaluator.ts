/**
 * Accuracy Evaluator
 *
 * Entry point of the scoring engine. Grades an actual (extracted) record
 * against an expected record and returns one result per field, plus one
 * result per sub-field of every aligned line-item pair.
 *
 * Flow:
 * 1. Union top-level keys from both records
 * 2. Scalar fields: weight lookup → registry comparator → result
 * 3. `items`: match and re-sequence both lists, then grade every sub-field
 *    of every aligned pair as `items.<sub_field>` tagged with the pair index
 */

import { Logging } from '../utils/logger';
import { DEFAULT_FIELD_WEIGHT, ITEMS_FIELD, ITEMS_PREFIX } from './constants';
import { ComparatorRegistry } from './comparatorRegistry';
import { compareField } from './fieldComparator';
import type { FieldEvaluationResult } from './fieldResult';
import { extractItems, ItemMatcher } from './itemMatcher';
import { unionKeys } from './itemSimilarity';
import { readField } from './valueNormalizer';
import { lookupWeight, validateWeightTable } from './weights';
import type { ExtractionRecord, WeightTable } from './types';

export interface AccuracyEvaluatorDeps {
  registry?: ComparatorRegistry;
  itemMatcher?: ItemMatcher;
}

export class AccuracyEvaluator {
  private readonly registry: ComparatorRegistry;
  private readonly itemMatcher: ItemMatcher;

  constructor(deps: AccuracyEvaluatorDeps = {}) {
    this.registry = deps.registry ?? new ComparatorRegistry();
    this.itemMatcher = deps.itemMatcher ?? new ItemMatcher();
  }

  /**
   * Grades `actual` against `expected`.
   *
   * @param weights - Field weights; item sub-fields use dotted keys such as `items.price`
   * @param defaultWeight - Weight for fields absent from `weights`
   * @throws AppError (CONFIGURATION_ERROR) for a negative or non-finite weight
   *
   * @example
   * await evaluator.evaluate(
   *   { total_price: 1000, doc_date: '2024-01-15' },
   *   { total_price: '¥1,000', doc_date: '2024年1月15日' },
   *   { total_price: 3 }
   * )
   * // Returns: two correct results, total_price scoring 3 and doc_date scoring 1
   */
  async evaluate(
    expected: ExtractionRecord,
    actual: ExtractionRecord,
    weights: Readonly<WeightTable> = {},
    defaultWeight: number = DEFAULT_FIELD_WEIGHT
  ): Promise<FieldEvaluationResult[]> {
    validateWeightTable(weights, defaultWeight);

    const results: FieldEvaluationResult[] = [];
    let fieldCount = 0;
    let itemPairCount = 0;

    for (const fieldName of unionKeys(expected, actual)) {
      if (fieldName === ITEMS_FIELD) {
        const items = await this.evaluateItems(expected, actual, weights, defaultWeight);
        itemPairCount = items.pairCount;
        results.push(...items.results);
        continue;
      }

      fieldCount += 1;

      results.push(
        compareField(
          this.registry.resolve(fieldName),
          fieldName,
          readField(expected, fieldName),
          readField(actual, fieldName),
          lookupWeight(weights, fieldName, defaultWeight)
        )
      );
    }

    Logging.debug(
      `Evaluated ${fieldCount} fields and ${itemPairCount} item pairs (${results.length} results)`
    );

    return results;
  }

  private async evaluateItems(
    expected: ExtractionRecord,
    actual: ExtractionRecord,
    weights: Readonly<WeightTable>,
    defaultWeight: number
  ): Promise<{ results: FieldEvaluationResult[]; pairCount: number }> {
    const aligned = await this.itemMatcher.alignItems(extractItems(expected), extractItems(actual));
    const subFields = unionKeys(...aligned.expected, ...aligned.actual);
    const results: FieldEvaluationResult[] = [];

    aligned.expected.forEach((expectedItem, itemIndex) => {
      const actualItem = aligned.actual[itemIndex];
      const matchScore = aligned.pairScores[itemIndex];

      for (const subField of subFields) {
        const fieldKey = `${ITEMS_PREFIX}${subField}`;
        results.push(
          compareField(
            this.registry.resolve(fieldKey),
            fieldKey,
            readField(expectedItem, subField),
            readField(actualItem, subField),
            lookupWeight(weights, fieldKey, defaultWeight),
            { itemIndex, details: { match_score: matchScore } }
          )
        );
      }
    });

    return { results, pairCount: aligned.expected.length };
  }
}

export default AccuracyEvaluator;
