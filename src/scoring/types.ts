/**
 * Type Definitions for the Extraction Scoring Engine
 *
 * Input records are JSON-compatible maps; line items are lists of such maps
 * under the reserved `items` key.
 */

// ============================================
// INPUT TYPES
// ============================================

export type ScalarValue = string | number | boolean | null;

export type FieldValue = ScalarValue | FieldValue[] | { [key: string]: FieldValue };

/** One extracted or expected document (string-keyed JSON map). */
export type ExtractionRecord = Record<string, FieldValue>;

/** One line item: a string-keyed map of sub-field values. */
export type ItemRecord = Record<string, FieldValue>;

/** Field name (dotted for item sub-fields, e.g. `items.price`) to non-negative weight. */
export type WeightTable = Record<string, number>;

// ============================================
// COMPARATORS
// ============================================

/**
 * Closed set of comparison strategies.
 * Amount tolerances are parameters, so "total price" and "tax amount"
 * style rules are amount comparators with different bounds.
 */
export type FieldComparator =
  | { kind: 'simple' }
  | { kind: 'amount'; tolerance: number; inclusive: boolean }
  | { kind: 'date' }
  | { kind: 'company_name' };

export type ComparatorKind = FieldComparator['kind'];

// ============================================
// ITEM MATCHING
// ============================================

/** Outcome of aligning one expected item with (at most) one actual item. */
export interface ItemMatch {
  /** Expected record, or an empty map for an unmatched actual item */
  readonly expectedItem: ItemRecord;
  /** Selected actual record (null when no counterpart was found) */
  readonly matchedItem: ItemRecord | null;
  /** Position of `matchedItem` in the original actual list */
  readonly matchedIndex: number | null;
  /** Similarity in [0, 1] */
  readonly matchScore: number;
  /** Per-sub-field agreement used to compute the similarity */
  readonly fieldMatches: Readonly<Record<string, boolean>>;
  /** Explanation supplied when an external matcher chose the pair */
  readonly matchReason?: string;
}

export interface ItemsMatchResult {
  /** Arithmetic mean of all per-expected-item match scores */
  overallScore: number;
  /** One entry per expected item, in expected-list order */
  matches: ItemMatch[];
}

export interface ItemSimilarity {
  score: number;
  fieldMatches: Record<string, boolean>;
}

/** Two item lists re-sequenced so that aligned pairs share an index. */
export interface AlignedItems {
  expected: ItemRecord[];
  actual: ItemRecord[];
  /** Match score for each aligned position (0 for unmatched placeholders) */
  pairScores: number[];
}

/** List-level summary of item matching quality. */
export interface ItemsMetric {
  field_name: string;
  expected_value: string;
  actual_value: string;
  weight: number;
  is_correct: boolean;
  field_score: number;
  items_accuracy: number;
  items_matches: Array<{
    expected: ItemRecord;
    matched: ItemRecord | null;
    score: number;
    field_matches: Record<string, boolean>;
    reason: string | null;
  }>;
}

// ============================================
// EXTERNAL MATCHER
// ============================================

/** `[expectedIndex, actualIndex (-1 for none), confidence]` */
export type ExternalMatchTriple = readonly [number, number, number];

export interface ExternalMatchRequest {
  expectedItems: readonly ItemRecord[];
  actualItems: readonly ItemRecord[];
  /** Human-readable rendering of each expected item, index-aligned */
  expectedDescriptions: string[];
  /** Human-readable rendering of each actual item, index-aligned */
  actualDescriptions: string[];
}

/**
 * Injectable pairing capability (e.g. a semantic matcher backed by a model).
 * Must return one triple per expected item; may be synchronous or asynchronous.
 */
export type ExternalMatcher = (
  request: ExternalMatchRequest
) => ExternalMatchTriple[] | Promise<ExternalMatchTriple[]>;

// ============================================
// AGGREGATION
// ============================================

export interface ItemSummary {
  accuracy: number;
  totalScore: number;
  totalWeight: number;
  fieldCount: number;
}

export interface FieldAccuracySummary {
  accuracy: number;
  weightedAccuracy: number;
  correctCount: number;
  totalCount: number;
  totalScore: number;
  totalWeight: number;
}
