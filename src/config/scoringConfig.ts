/**
 * Scoring configuration loader.
 *
 * Reads field weights and comparator bindings from a JSON file and flattens
 * them into the weight table shape the evaluator takes.
 */

import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { AppError } from '../utils/AppError';
import { Logging } from '../utils/logger';
import { DEFAULT_FIELD_WEIGHT, ITEMS_FIELD, ITEMS_PREFIX } from '../scoring/constants';
import { splitItemWeights } from '../scoring/weights';
import type { WeightTable } from '../scoring/types';
import { env } from './env';

export const DEFAULT_SCORING_CONFIG_PATH = path.resolve(__dirname, '../../config/scoring.json');

const DEFAULT_WEIGHT_KEY = 'default_weight';

const weightSchema = z.number().finite().nonnegative();

const scoringConfigSchema = z.object({
  field_weights: z.record(z.union([weightSchema, z.record(weightSchema)])).default({}),
  field_comparators: z.record(z.string().min(1)).default({}),
});

export type RawScoringConfig = z.input<typeof scoringConfigSchema>;

export interface ScoringConfig {
  /** Flat table; item sub-fields use `items.<sub_field>` keys */
  fieldWeights: WeightTable;
  defaultWeight: number;
  /** Item sub-field weights without the `items.` prefix, for the item matcher */
  itemFieldWeights: WeightTable;
  itemDefaultWeight: number;
  /** Field name → comparator name */
  fieldComparators: Record<string, string>;
}

/**
 * Validates and flattens a raw configuration object.
 *
 * Nested `items` weights become `items.<sub_field>` keys; flat `items.<sub_field>`
 * keys are accepted as well. `default_weight` at either level is pulled out.
 *
 * @throws AppError (CONFIGURATION_ERROR) when the shape or any weight is invalid
 */
export function parseScoringConfig(raw: unknown): ScoringConfig {
  const parsed = scoringConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.errors
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join(', ');
    throw AppError.configuration(`Invalid scoring configuration: ${issues}`);
  }

  const fieldWeights: WeightTable = {};
  let defaultWeight = DEFAULT_FIELD_WEIGHT;
  let itemDefaultWeight: number | undefined;

  for (const [fieldName, weight] of Object.entries(parsed.data.field_weights)) {
    if (typeof weight === 'number') {
      if (fieldName === DEFAULT_WEIGHT_KEY) {
        defaultWeight = weight;
      } else if (fieldName === `${ITEMS_PREFIX}${DEFAULT_WEIGHT_KEY}`) {
        itemDefaultWeight = weight;
      } else {
        fieldWeights[fieldName] = weight;
      }
      continue;
    }

    if (fieldName !== ITEMS_FIELD) {
      throw AppError.configuration(
        `Only "${ITEMS_FIELD}" may hold nested weights, found object under "${fieldName}"`
      );
    }

    for (const [subField, subWeight] of Object.entries(weight)) {
      if (subField === DEFAULT_WEIGHT_KEY) {
        itemDefaultWeight = subWeight;
      } else {
        fieldWeights[`${ITEMS_PREFIX}${subField}`] = subWeight;
      }
    }
  }

  return {
    fieldWeights,
    defaultWeight,
    itemFieldWeights: splitItemWeights(fieldWeights),
    itemDefaultWeight: itemDefaultWeight ?? defaultWeight,
    fieldComparators: parsed.data.field_comparators,
  };
}

/**
 * Loads the scoring configuration from disk.
 * Defaults to `SCORING_CONFIG_PATH`, then `config/scoring.json`.
 *
 * @throws AppError (CONFIGURATION_ERROR) when the file is missing, not JSON, or invalid
 */
export function loadScoringConfig(
  filePath: string = env.SCORING_CONFIG_PATH ?? DEFAULT_SCORING_CONFIG_PATH
): ScoringConfig {
  let contents: string;
  try {
    contents = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw AppError.configuration(
      `Cannot read scoring configuration at ${filePath}: ${
        error instanceof Error ? error.message : String(error)
      }`
    );
  }

  let raw: unknown;
  try {
    raw = JSON.parse(contents);
  } catch (error) {
    throw AppError.configuration(
      `Scoring configuration at ${filePath} is not valid JSON: ${
        error instanceof Error ? error.message : String(error)
      }`
    );
  }

  const config = parseScoringConfig(raw);
  Logging.info(
    `Loaded scoring configuration from ${filePath} ` +
      `(${Object.keys(config.fieldWeights).length} weights, ` +
      `${Object.keys(config.fieldComparators).length} comparator bindings)`
  );
  return config;
}
