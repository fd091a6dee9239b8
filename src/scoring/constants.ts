/**
 * Constants for the Extraction Scoring Engine
 *
 * Field names, tolerances and default weights used when grading
 * extracted invoice/estimate records against expected records.
 */

// ============================================
// RESERVED FIELD NAMES
// ============================================

/** Top-level key holding the line-item list. Recognized structurally, not configurable. */
export const ITEMS_FIELD = 'items';

/** Prefix for item sub-field result names and weight keys (e.g. "items.price"). */
export const ITEMS_PREFIX = `${ITEMS_FIELD}.`;

/** Sub-field compared with the layered name heuristic during item matching. */
export const NAME_FIELD = 'name';

// ============================================
// TOLERANCES
// ============================================

/**
 * Absolute tolerance for amount comparison.
 * Monetary fields are typically integer currency units, so this is deliberately tight.
 */
export const AMOUNT_TOLERANCE = 0.01;

/** Final totals must agree to within one currency unit. */
export const TOTAL_PRICE_TOLERANCE = 1.0;

/** Tax is derived by calculation and may differ by rounding (inclusive bound). */
export const TAX_PRICE_TOLERANCE = 10.0;

/** Minimum shared-word ratio for two item names to count as the same name. */
export const NAME_TOKEN_OVERLAP_THRESHOLD = 0.5;

// ============================================
// NORMALIZATION
// ============================================

/** Characters stripped from amount strings before parsing. */
export const AMOUNT_STRIP_PATTERN = /[,¥$€£\s]/g;

/**
 * Combining marks removed for diacritic-insensitive name matching:
 * katakana/hiragana voiced and semi-voiced marks (combining and spacing forms)
 * plus the Latin combining diacritics block.
 */
export const NAME_DIACRITIC_PATTERN = /[\u0300-\u036f\u3099-\u309c]/g;

// ============================================
// WEIGHTS
// ============================================

export const DEFAULT_FIELD_WEIGHT = 1.0;

/** Sub-field weights used by the item matcher when no configuration is supplied. */
export const DEFAULT_ITEM_FIELD_WEIGHTS: Readonly<Record<string, number>> = {
  name: 3.0,
  quantity: 2.0,
  price: 2.0,
  sub_total: 2.0,
  unit: 1.0,
  spec: 1.0,
  note: 0.5,
  account_item: 1.0,
};

/** Weight given to the whole item list by the list-level items metric. */
export const ITEMS_METRIC_BASE_WEIGHT = 5.0;

/** List-level accuracy at which the items metric counts as correct. */
export const ITEMS_METRIC_PASS_THRESHOLD = 0.8;
