/**
 * Weight table helpers shared by the evaluator, the item matcher and the
 * configuration loader.
 */

import { AppError } from '../utils/AppError';
import { ITEMS_PREFIX } from './constants';
import type { WeightTable } from './types';

/**
 * Looks up a weight, falling back to `defaultWeight` for unlisted fields.
 */
export function lookupWeight(
  table: Readonly<WeightTable>,
  key: string,
  defaultWeight: number
): number {
  return Object.prototype.hasOwnProperty.call(table, key) ? table[key] : defaultWeight;
}

function isValidWeight(weight: unknown): weight is number {
  return typeof weight === 'number' && Number.isFinite(weight) && weight >= 0;
}

/**
 * @throws AppError (CONFIGURATION_ERROR) when any weight, or the default, is
 * negative, non-finite or not a number
 */
export function validateWeightTable(table: Readonly<WeightTable>, defaultWeight: number): void {
  if (!isValidWeight(defaultWeight)) {
    throw AppError.configuration(`Default weight must be a non-negative number: ${defaultWeight}`);
  }

  for (const [fieldName, weight] of Object.entries(table)) {
    if (!isValidWeight(weight)) {
      throw AppError.configuration(
        `Weight for "${fieldName}" must be a non-negative number: ${String(weight)}`
      );
    }
  }
}

/**
 * Item sub-field weights with the `items.` prefix removed, as the item matcher expects.
 *
 * @example
 * splitItemWeights({ total_price: 3, 'items.name': 2 }) // Returns: { name: 2 }
 */
export function splitItemWeights(table: Readonly<WeightTable>): WeightTable {
  const itemWeights: WeightTable = {};
  for (const [fieldName, weight] of Object.entries(table)) {
    if (fieldName.startsWith(ITEMS_PREFIX)) {
      itemWeights[fieldName.slice(ITEMS_PREFIX.length)] = weight;
    }
  }
  return itemWeights;
}
