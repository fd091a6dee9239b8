/**
 * Result Aggregator
 *
 * Read-only views over a flat list of field results: overall and per-field
 * accuracy, per-item summaries, and filters.
 */

import { ITEMS_PREFIX } from './constants';
import type { FieldEvaluationResult } from './fieldResult';
import type { FieldAccuracySummary, ItemSummary } from './types';

function sumScores(results: readonly FieldEvaluationResult[]): { score: number; weight: number } {
  return results.reduce(
    (totals, result) => ({
      score: totals.score + result.score,
      weight: totals.weight + result.weight,
    }),
    { score: 0, weight: 0 }
  );
}

function weightedAccuracy(results: readonly FieldEvaluationResult[]): number {
  const { score, weight } = sumScores(results);
  return weight > 0 ? score / weight : 0;
}

function groupBy<K>(
  results: readonly FieldEvaluationResult[],
  keyOf: (result: FieldEvaluationResult) => K | undefined
): Map<K, FieldEvaluationResult[]> {
  const groups = new Map<K, FieldEvaluationResult[]>();
  for (const result of results) {
    const key = keyOf(result);
    if (key === undefined) continue;

    const group = groups.get(key);
    if (group) {
      group.push(result);
    } else {
      groups.set(key, [result]);
    }
  }
  return groups;
}

export class ResultAggregator {
  private readonly results: readonly FieldEvaluationResult[];

  constructor(results: readonly FieldEvaluationResult[]) {
    this.results = [...results];
  }

  // ============================================
  // Filters
  // ============================================

  getByFieldName(fieldName: string): FieldEvaluationResult[] {
    return this.results.filter((result) => result.fieldName === fieldName);
  }

  getByItemIndex(itemIndex: number): FieldEvaluationResult[] {
    return this.results.filter((result) => result.itemIndex === itemIndex);
  }

  getByFieldAndItem(fieldName: string, itemIndex: number): FieldEvaluationResult | undefined {
    return this.results.find(
      (result) => result.fieldName === fieldName && result.itemIndex === itemIndex
    );
  }

  getItemsResults(): FieldEvaluationResult[] {
    return this.results.filter((result) => result.fieldName.startsWith(ITEMS_PREFIX));
  }

  getNonItemsResults(): FieldEvaluationResult[] {
    return this.results.filter((result) => !result.fieldName.startsWith(ITEMS_PREFIX));
  }

  // ============================================
  // Accuracy
  // ============================================

  /** Σ score / Σ weight over every result; 0 when the total weight is 0. */
  calculateOverallAccuracy(): number {
    return weightedAccuracy(this.results);
  }

  /** Weighted accuracy restricted to item sub-field results. */
  calculateItemsAccuracy(): number {
    return weightedAccuracy(this.getItemsResults());
  }

  /**
   * Per aligned item pair, keyed by item index in first-seen order.
   */
  getItemSummary(): Map<number, ItemSummary> {
    const summary = new Map<number, ItemSummary>();

    for (const [itemIndex, results] of groupBy(this.results, (result) => result.itemIndex)) {
      const { score, weight } = sumScores(results);
      summary.set(itemIndex, {
        accuracy: weight > 0 ? score / weight : 0,
        totalScore: score,
        totalWeight: weight,
        fieldCount: results.length,
      });
    }

    return summary;
  }

  /**
   * Per display name (`items.price[0]` for item sub-fields):
   * unweighted correct/total ratio and weighted Σ score / Σ weight.
   */
  getFieldAccuracySummary(): Record<string, FieldAccuracySummary> {
    const summary: Record<string, FieldAccuracySummary> = {};

    for (const [displayName, results] of groupBy(this.results, (result) => result.displayName)) {
      const correctCount = results.filter((result) => result.isCorrect).length;
      const { score, weight } = sumScores(results);

      summary[displayName] = {
        accuracy: results.length > 0 ? correctCount / results.length : 0,
        weightedAccuracy: weight > 0 ? score / weight : 0,
        correctCount,
        totalCount: results.length,
        totalScore: score,
        totalWeight: weight,
      };
    }

    return summary;
  }

  /** Display name → correctness. */
  getFieldAccuracies(): Record<string, boolean> {
    const accuracies: Record<string, boolean> = {};
    for (const result of this.results) {
      accuracies[result.displayName] = result.isCorrect;
    }
    return accuracies;
  }
}

export default ResultAggregator;
