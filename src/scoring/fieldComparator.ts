/**
 * Field Comparison Strategies
 *
 * Grades one expected/actual value pair under a comparator from the closed
 * set in `FieldComparator`:
 * - simple: trimmed, case-insensitive text equality
 * - amount: numeric difference within an absolute tolerance
 * - date: same calendar day, whatever the format
 * - company_name: legal-entity notations and whitespace ignored
 *
 * Null handling is shared: both null is correct, exactly one null is incorrect.
 * Amount and date parse failures fall back to simple comparison.
 */

import { AppError } from '../utils/AppError';
import { AMOUNT_TOLERANCE, TAX_PRICE_TOLERANCE, TOTAL_PRICE_TOLERANCE } from './constants';
import { FieldEvaluationResult } from './fieldResult';
import type { FieldResultOptions } from './fieldResult';
import { normalizeText, parseAmount, parseDate } from './valueNormalizer';
import type { FieldComparator, FieldValue } from './types';

// ============================================
// Built-in comparator definitions
// ============================================

export const SIMPLE_COMPARATOR: FieldComparator = { kind: 'simple' };

export const AMOUNT_COMPARATOR: FieldComparator = {
  kind: 'amount',
  tolerance: AMOUNT_TOLERANCE,
  inclusive: false,
};

export const TOTAL_PRICE_COMPARATOR: FieldComparator = {
  kind: 'amount',
  tolerance: TOTAL_PRICE_TOLERANCE,
  inclusive: false,
};

export const TAX_PRICE_COMPARATOR: FieldComparator = {
  kind: 'amount',
  tolerance: TAX_PRICE_TOLERANCE,
  inclusive: true,
};

export const DATE_COMPARATOR: FieldComparator = { kind: 'date' };

export const COMPANY_NAME_COMPARATOR: FieldComparator = { kind: 'company_name' };

// ============================================
// Strategy implementations
// ============================================

function isSimpleMatch(expected: FieldValue, actual: FieldValue): boolean {
  return normalizeText(expected) === normalizeText(actual);
}

/**
 * Runs a typed comparison, falling back to simple comparison when either
 * side fails to parse. Errors other than parse failures propagate.
 */
function withParseFallback(
  expected: FieldValue,
  actual: FieldValue,
  compare: () => boolean
): boolean {
  try {
    return compare();
  } catch (error) {
    if (AppError.isParseError(error)) {
      return isSimpleMatch(expected, actual);
    }
    throw error;
  }
}

function isAmountMatch(
  expected: FieldValue,
  actual: FieldValue,
  tolerance: number,
  inclusive: boolean
): boolean {
  return withParseFallback(expected, actual, () => {
    const difference = Math.abs(parseAmount(expected) - parseAmount(actual));
    return inclusive ? difference <= tolerance : difference < tolerance;
  });
}

function isDateMatch(expected: FieldValue, actual: FieldValue): boolean {
  return withParseFallback(
    expected,
    actual,
    () => parseDate(expected).getTime() === parseDate(actual).getTime()
  );
}

/**
 * Collapses Japanese legal-entity notations to one token each and drops whitespace.
 *
 * @example
 * normalizeCompanyName("㈱ テスト商事")    // Returns: "kabushikigaishaテスト商事"
 * normalizeCompanyName("株式会社テスト商事") // Returns: "kabushikigaishaテスト商事"
 */
export function normalizeCompanyName(value: FieldValue): string {
  return normalizeText(value)
    .replace(/株式会社|㈱|\(株\)|（株）/g, 'kabushikigaisha')
    .replace(/有限会社|㈲|\(有\)|（有）/g, 'yuugengaisha')
    .replace(/合同会社|\(合\)|（合）/g, 'goudougaisha')
    .replace(/\s+/g, '');
}

/**
 * Decides whether two values agree under a comparator.
 */
export function valuesMatch(
  comparator: FieldComparator,
  expected: FieldValue,
  actual: FieldValue
): boolean {
  if (expected === null && actual === null) {
    return true;
  }
  if (expected === null || actual === null) {
    return false;
  }

  switch (comparator.kind) {
    case 'simple':
      return isSimpleMatch(expected, actual);
    case 'amount':
      return isAmountMatch(expected, actual, comparator.tolerance, comparator.inclusive);
    case 'date':
      return isDateMatch(expected, actual);
    case 'company_name':
      return normalizeCompanyName(expected) === normalizeCompanyName(actual);
  }
}

/**
 * Grades one field and wraps the outcome in a `FieldEvaluationResult`.
 *
 * @example
 * compareField(AMOUNT_COMPARATOR, 'total_price', 1000, '1,000', 3)
 * // Returns: correct result with score 3
 */
export function compareField(
  comparator: FieldComparator,
  fieldName: string,
  expected: FieldValue,
  actual: FieldValue,
  weight: number,
  options: FieldResultOptions = {}
): FieldEvaluationResult {
  const isCorrect = valuesMatch(comparator, expected, actual);
  return FieldEvaluationResult.create(fieldName, expected, actual, weight, isCorrect, options);
}
