/**
 * Comparator Registry
 *
 * Maps field names to named comparators. Unregistered fields use `simple`.
 * One registry is built per scoring session and injected into the evaluator.
 */

import { AppError } from '../utils/AppError';
import {
  AMOUNT_COMPARATOR,
  COMPANY_NAME_COMPARATOR,
  DATE_COMPARATOR,
  SIMPLE_COMPARATOR,
  TAX_PRICE_COMPARATOR,
  TOTAL_PRICE_COMPARATOR,
} from './fieldComparator';
import type { FieldComparator } from './types';

const BUILT_IN_COMPARATORS: ReadonlyArray<[string, FieldComparator]> = [
  ['simple', SIMPLE_COMPARATOR],
  ['amount', AMOUNT_COMPARATOR],
  ['date', DATE_COMPARATOR],
  ['total_price', TOTAL_PRICE_COMPARATOR],
  ['tax_price', TAX_PRICE_COMPARATOR],
  ['company_name', COMPANY_NAME_COMPARATOR],
];

/** Field name → comparator name bindings every registry starts with. */
export const DEFAULT_FIELD_MAPPINGS: Readonly<Record<string, string>> = {
  total_price: 'amount',
  tax_price: 'amount',
  sub_total: 'amount',
  doc_date: 'date',
  expiration_date: 'date',
  'items.price': 'amount',
  'items.sub_total': 'amount',
  'items.quantity': 'amount',
};

const DEFAULT_COMPARATOR_NAME = 'simple';

export class ComparatorRegistry {
  private readonly comparators = new Map<string, FieldComparator>(BUILT_IN_COMPARATORS);
  private readonly fieldMappings = new Map<string, string>();

  constructor(fieldMappings: Readonly<Record<string, string>> = DEFAULT_FIELD_MAPPINGS) {
    for (const [fieldName, comparatorName] of Object.entries(fieldMappings)) {
      this.addFieldMapping(fieldName, comparatorName);
    }
  }

  /**
   * Binds a field to a comparator, replacing any earlier binding.
   *
   * @throws AppError (CONFIGURATION_ERROR) for an unknown comparator name
   */
  addFieldMapping(fieldName: string, comparatorName: string): void {
    if (!this.comparators.has(comparatorName)) {
      throw AppError.configuration(
        `Unknown comparator "${comparatorName}" for field "${fieldName}"`
      );
    }
    this.fieldMappings.set(fieldName, comparatorName);
  }

  /**
   * Adds (or replaces) a named comparator, e.g. an amount rule with its own tolerance.
   *
   * @throws AppError (CONFIGURATION_ERROR) for a negative or non-finite tolerance
   */
  registerComparator(name: string, comparator: FieldComparator): void {
    if (
      comparator.kind === 'amount' &&
      (!Number.isFinite(comparator.tolerance) || comparator.tolerance < 0)
    ) {
      throw AppError.configuration(`Comparator "${name}" needs a non-negative tolerance`);
    }
    this.comparators.set(name, comparator);
  }

  hasComparator(name: string): boolean {
    return this.comparators.has(name);
  }

  getComparatorName(fieldName: string): string {
    return this.fieldMappings.get(fieldName) ?? DEFAULT_COMPARATOR_NAME;
  }

  /** Comparator that grades `fieldName` (dotted for item sub-fields). */
  resolve(fieldName: string): FieldComparator {
    return this.comparators.get(this.getComparatorName(fieldName)) ?? SIMPLE_COMPARATOR;
  }
}

export default ComparatorRegistry;
