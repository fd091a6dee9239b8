/**
 * Value Normalization for Extraction Scoring
 *
 * Extracted values arrive in many shapes: "¥1,000", 1000, "1000.0",
 * "2024年1月15日", "2024-01-15". This module turns them into forms
 * that can be compared directly.
 *
 * Example transformations:
 * - "¥1,000" → 1000
 * - "2024年1月15日" → 2024-01-15 (UTC midnight)
 * - "  Pump Unit " → "pump unit"
 */

import { AppError } from '../utils/AppError';
import { AMOUNT_STRIP_PATTERN, NAME_DIACRITIC_PATTERN } from './constants';
import type { FieldValue } from './types';

const NUMERIC_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

interface DateFormat {
  pattern: RegExp;
  year: number;
  month: number;
  day: number;
}

/**
 * Accepted date layouts, tried in order; the first that fully parses wins.
 * Numbers are capture-group positions. Month and day accept one or two digits.
 */
const DATE_FORMATS: readonly DateFormat[] = [
  { pattern: /^(\d{4})-(\d{1,2})-(\d{1,2})$/, year: 1, month: 2, day: 3 },
  { pattern: /^(\d{4})\/(\d{1,2})\/(\d{1,2})$/, year: 1, month: 2, day: 3 },
  { pattern: /^(\d{4})年(\d{1,2})月(\d{1,2})日$/, year: 1, month: 2, day: 3 },
  { pattern: /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/, year: 3, month: 1, day: 2 },
  { pattern: /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/, year: 3, month: 2, day: 1 },
];

/**
 * Renders any field value as text.
 * Objects and arrays are rendered as JSON so structurally equal values compare equal.
 */
export function toText(value: FieldValue): string {
  if (value === null) {
    return '';
  }
  if (typeof value === 'object') {
    return JSON.stringify(value);
  }
  return String(value);
}

/**
 * Canonical text for equality checks: trimmed and case-folded.
 *
 * @example
 * normalizeText("  Pump UNIT ") // Returns: "pump unit"
 */
export function normalizeText(value: FieldValue): string {
  return toText(value).trim().toLowerCase();
}

/**
 * Text form used by the diacritic-insensitive name check.
 * Applies compatibility decomposition and removes voiced/semi-voiced
 * kana marks and Latin combining accents, so "ポンプ" and "ホンプ" agree.
 */
export function normalizeForNameMatch(value: FieldValue): string {
  return normalizeText(value)
    .normalize('NFKD')
    .replace(NAME_DIACRITIC_PATTERN, '')
    .normalize('NFC');
}

/**
 * Parses a strict decimal string (no residue allowed).
 * Returns null when the text is not a number.
 */
function parseDecimal(text: string): number | null {
  if (!NUMERIC_PATTERN.test(text)) {
    return null;
  }
  const parsed = Number(text);
  return Number.isFinite(parsed) ? parsed : null;
}

/**
 * Parses a monetary amount.
 *
 * Numbers pass through; strings lose whitespace, currency symbols and
 * thousands separators before parsing.
 *
 * @throws AppError (PARSE_ERROR) when the value is not a number after cleanup
 *
 * @example
 * parseAmount("¥1,000") // Returns: 1000
 * parseAmount(12.5)     // Returns: 12.5
 * parseAmount("abc")    // Throws
 */
export function parseAmount(value: FieldValue): number {
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      throw AppError.parse(`Amount is not finite: ${value}`);
    }
    return value;
  }

  if (typeof value !== 'string') {
    throw AppError.parse(`Amount must be a number or string, got ${toText(value)}`);
  }

  const parsed = parseDecimal(value.replace(AMOUNT_STRIP_PATTERN, ''));
  if (parsed === null) {
    throw AppError.parse(`Cannot parse amount: ${value}`);
  }
  return parsed;
}

/**
 * Lenient numeric reading used by item matching: only thousands separators
 * and surrounding whitespace are removed. Returns null instead of throwing.
 */
export function parseLooseNumber(value: FieldValue): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value !== 'string') {
    return null;
  }
  return parseDecimal(value.replace(/,/g, '').trim());
}

function buildCalendarDate(year: number, month: number, day: number): Date | null {
  const date = new Date(Date.UTC(year, month - 1, day));

  // Reject rollovers such as 2024-02-30
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    return null;
  }
  return date;
}

/**
 * Parses a calendar date, normalized to midnight UTC.
 *
 * Formats tried in order: YYYY-MM-DD, YYYY/MM/DD, YYYY年MM月DD日,
 * MM/DD/YYYY, DD/MM/YYYY. Ambiguous slash dates resolve month-first.
 *
 * @throws AppError (PARSE_ERROR) when no format matches
 *
 * @example
 * parseDate("2024年1月15日") // Returns: 2024-01-15T00:00:00.000Z
 * parseDate("25/12/2024")    // Returns: 2024-12-25T00:00:00.000Z (month-first fails)
 */
export function parseDate(value: FieldValue): Date {
  if (typeof value !== 'string') {
    throw AppError.parse(`Date must be a string, got ${toText(value)}`);
  }

  const text = value.trim();

  for (const format of DATE_FORMATS) {
    const match = format.pattern.exec(text);
    if (!match) continue;

    const date = buildCalendarDate(
      Number(match[format.year]),
      Number(match[format.month]),
      Number(match[format.day])
    );
    if (date) {
      return date;
    }
  }

  throw AppError.parse(`Cannot parse date: ${value}`);
}

/**
 * Whether an item value counts as absent for matching purposes:
 * null, empty string, or numeric zero.
 */
export function isEmptyValue(value: FieldValue | undefined): boolean {
  return value === undefined || value === null || value === '' || value === 0;
}

/**
 * Reads an own property of a record, treating a missing key as null.
 */
export function readField(record: Readonly<Record<string, FieldValue>>, key: string): FieldValue {
  return Object.prototype.hasOwnProperty.call(record, key) ? record[key] : null;
}

