/**
 * Extraction Scoring Engine
 *
 * Pure functions and classes for grading extracted records against expected
 * records: value normalization, field comparators, line-item matching and
 * result aggregation.
 *
 * Usage:
 * ```typescript
 * import { AccuracyEvaluator, ResultAggregator } from './scoring';
 *
 * const results = await new AccuracyEvaluator().evaluate(expected, actual, weights);
 * console.log(new ResultAggregator(results).calculateOverallAccuracy());
 * ```
 */

// Main entry points
export { AccuracyEvaluator } from './accuracyEvaluator';
export type { AccuracyEvaluatorDeps } from './accuracyEvaluator';
export { ResultAggregator } from './resultAggregator';
export { FieldEvaluationResult } from './fieldResult';
export type { FieldEvaluationResultJson, FieldResultOptions } from './fieldResult';

// Comparators
export {
  compareField,
  valuesMatch,
  normalizeCompanyName,
  SIMPLE_COMPARATOR,
  AMOUNT_COMPARATOR,
  TOTAL_PRICE_COMPARATOR,
  TAX_PRICE_COMPARATOR,
  DATE_COMPARATOR,
  COMPANY_NAME_COMPARATOR,
} from './fieldComparator';
export { ComparatorRegistry, DEFAULT_FIELD_MAPPINGS } from './comparatorRegistry';

// Item matching
export { ItemMatcher, reorderItems, extractItems } from './itemMatcher';
export type { ItemMatcherOptions } from './itemMatcher';
export { calculateItemSimilarity, isItemValueMatch } from './itemSimilarity';
export type { SimilarityWeights } from './itemSimilarity';
export { isNameMatch, calculateTokenOverlap, tokenizeName } from './nameMatcher';
export { formatItemForMatching, sanitizeExternalMatches, NO_MATCH_INDEX } from './externalMatcher';

// Normalization and weights
export {
  parseAmount,
  parseDate,
  parseLooseNumber,
  normalizeText,
  normalizeForNameMatch,
  isEmptyValue,
} from './valueNormalizer';
export { lookupWeight, validateWeightTable, splitItemWeights } from './weights';

// Constants
export {
  ITEMS_FIELD,
  ITEMS_PREFIX,
  NAME_FIELD,
  AMOUNT_TOLERANCE,
  TOTAL_PRICE_TOLERANCE,
  TAX_PRICE_TOLERANCE,
  DEFAULT_FIELD_WEIGHT,
  DEFAULT_ITEM_FIELD_WEIGHTS,
} from './constants';

// Types
export type {
  ScalarValue,
  FieldValue,
  ExtractionRecord,
  ItemRecord,
  WeightTable,
  FieldComparator,
  ComparatorKind,
  ItemMatch,
  ItemsMatchResult,
  ItemSimilarity,
  AlignedItems,
  ItemsMetric,
  ExternalMatcher,
  ExternalMatchRequest,
  ExternalMatchTriple,
  ItemSummary,
  FieldAccuracySummary,
} from './types';
