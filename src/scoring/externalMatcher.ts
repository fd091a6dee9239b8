/**
 * External Matcher Support
 *
 * Helpers around the injectable `ExternalMatcher` capability: rendering items
 * into readable lines for it, and repairing whatever it returns into exactly
 * one triple per expected item before the item matcher trusts it.
 */

import { z } from 'zod';
import { AppError } from '../utils/AppError';
import { Logging } from '../utils/logger';
import { readField, toText } from './valueNormalizer';
import type { ExternalMatchTriple, FieldValue, ItemRecord } from './types';

export const NO_MATCH_INDEX = -1;

// NaN is let through here and zeroed by the sanitizer
const matchNumberSchema = z.union([z.number(), z.nan()]);

const externalMatchesSchema = z.array(
  z.tuple([matchNumberSchema, matchNumberSchema, matchNumberSchema])
);

function isPresent(value: FieldValue): boolean {
  return value !== null && value !== '';
}

function formatAmount(value: FieldValue): string {
  return typeof value === 'number' ? value.toLocaleString('en-US') : toText(value);
}

/**
 * Renders one item as "name / quantity+unit / unit price / spec / note".
 * Absent parts are skipped.
 *
 * @example
 * formatItemForMatching({ name: 'Bolt', quantity: 10, unit: 'pcs', price: 1200 })
 * // Returns: "name:Bolt / quantity:10pcs / unit price:1,200"
 */
export function formatItemForMatching(item: ItemRecord): string {
  const parts: string[] = [];

  const name = readField(item, 'name');
  const quantity = readField(item, 'quantity');
  const price = readField(item, 'price');
  const spec = readField(item, 'spec');
  const note = readField(item, 'note');

  if (isPresent(name)) {
    parts.push(`name:${toText(name)}`);
  }
  if (quantity !== null) {
    parts.push(`quantity:${toText(quantity)}${toText(readField(item, 'unit'))}`);
  }
  if (price !== null) {
    parts.push(`unit price:${formatAmount(price)}`);
  }
  if (isPresent(spec)) {
    parts.push(`spec:${toText(spec)}`);
  }
  if (isPresent(note)) {
    parts.push(`note:${toText(note)}`);
  }

  return parts.join(' / ');
}

/**
 * Checks that external matcher output is a list of numeric triples.
 *
 * @throws AppError (EXTERNAL_MATCHER_ERROR) for any other shape
 */
export function parseExternalMatches(output: unknown): ExternalMatchTriple[] {
  const parsed = externalMatchesSchema.safeParse(output);

  if (!parsed.success) {
    const issues = parsed.error.errors
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join(', ');
    throw AppError.externalMatcher(`External matcher returned malformed pairings: ${issues}`);
  }

  return parsed.data;
}

function clampConfidence(confidence: number): number {
  if (!Number.isFinite(confidence)) {
    return 0;
  }
  return Math.min(1, Math.max(0, confidence));
}

/**
 * Repairs external matcher output into one triple per expected index, sorted.
 *
 * - expected indices outside the list, or already seen, are dropped
 * - missing expected indices become `[i, -1, 0]`
 * - actual indices outside the list become -1 with confidence 0
 * - an actual index claimed by an earlier triple becomes -1 with confidence 0
 * - confidence is clamped into [0, 1]
 */
export function sanitizeExternalMatches(
  triples: readonly ExternalMatchTriple[],
  expectedCount: number,
  actualCount: number
): ExternalMatchTriple[] {
  const byExpected = new Map<number, ExternalMatchTriple>();
  const claimedActual = new Set<number>();
  let repairs = 0;

  for (const [expectedIndex, actualIndex, confidence] of triples) {
    if (
      !Number.isInteger(expectedIndex) ||
      expectedIndex < 0 ||
      expectedIndex >= expectedCount ||
      byExpected.has(expectedIndex)
    ) {
      repairs += 1;
      continue;
    }

    const inRange = Number.isInteger(actualIndex) && actualIndex >= 0 && actualIndex < actualCount;
    if (!inRange || claimedActual.has(actualIndex)) {
      if (actualIndex !== NO_MATCH_INDEX) repairs += 1;
      byExpected.set(expectedIndex, [expectedIndex, NO_MATCH_INDEX, 0]);
      continue;
    }

    claimedActual.add(actualIndex);
    byExpected.set(expectedIndex, [expectedIndex, actualIndex, clampConfidence(confidence)]);
  }

  const result: ExternalMatchTriple[] = [];
  for (let index = 0; index < expectedCount; index++) {
    result.push(byExpected.get(index) ?? [index, NO_MATCH_INDEX, 0]);
  }

  if (repairs > 0) {
    Logging.warn(`External matcher returned ${repairs} unusable pairing(s); treated as no match`);
  }

  return result;
}
