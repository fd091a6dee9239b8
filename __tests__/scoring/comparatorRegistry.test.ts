/**
 * Tests for Comparator Registry
 */

import { ComparatorRegistry } from '../../src/scoring/comparatorRegistry';
import {
  AMOUNT_COMPARATOR,
  DATE_COMPARATOR,
  SIMPLE_COMPARATOR,
  TAX_PRICE_COMPARATOR,
} from '../../src/scoring/fieldComparator';
import { AppError } from '../../src/utils/AppError';

describe('ComparatorRegistry', () => {
  describe('default mappings', () => {
    const registry = new ComparatorRegistry();

    it('should route amount-like fields to the amount comparator', () => {
      expect(registry.resolve('total_price')).toEqual(AMOUNT_COMPARATOR);
      expect(registry.resolve('tax_price')).toEqual(AMOUNT_COMPARATOR);
      expect(registry.resolve('sub_total')).toEqual(AMOUNT_COMPARATOR);
    });

    it('should route date-like fields to the date comparator', () => {
      expect(registry.resolve('doc_date')).toEqual(DATE_COMPARATOR);
      expect(registry.resolve('expiration_date')).toEqual(DATE_COMPARATOR);
    });

    it('should route numeric item sub-fields to the amount comparator', () => {
      expect(registry.resolve('items.price')).toEqual(AMOUNT_COMPARATOR);
      expect(registry.resolve('items.quantity')).toEqual(AMOUNT_COMPARATOR);
      expect(registry.resolve('items.sub_total')).toEqual(AMOUNT_COMPARATOR);
    });

    it('should fall back to simple for unregistered fields', () => {
      expect(registry.resolve('issuer')).toEqual(SIMPLE_COMPARATOR);
      expect(registry.resolve('items.name')).toEqual(SIMPLE_COMPARATOR);
      expect(registry.getComparatorName('issuer')).toBe('simple');
    });
  });

  describe('addFieldMapping', () => {
    it('should overwrite an existing binding', () => {
      const registry = new ComparatorRegistry();

      registry.addFieldMapping('tax_price', 'tax_price');
      expect(registry.resolve('tax_price')).toEqual(TAX_PRICE_COMPARATOR);

      registry.addFieldMapping('tax_price', 'simple');
      expect(registry.resolve('tax_price')).toEqual(SIMPLE_COMPARATOR);
    });

    it('should fail fast on unknown comparator names', () => {
      const registry = new ComparatorRegistry();

      expect(() => registry.addFieldMapping('issuer', 'fuzzy')).toThrow(AppError);
      expect(() => registry.addFieldMapping('issuer', 'fuzzy')).toThrow(
        'Unknown comparator "fuzzy" for field "issuer"'
      );
      expect(registry.getComparatorName('issuer')).toBe('simple');
    });

    it('should reject unknown names passed to the constructor', () => {
      expect(() => new ComparatorRegistry({ issuer: 'fuzzy' })).toThrow(AppError);
    });
  });

  describe('registerComparator', () => {
    it('should make a custom tolerance available for binding', () => {
      const registry = new ComparatorRegistry();

      registry.registerComparator('loose_amount', { kind: 'amount', tolerance: 5, inclusive: true });
      registry.addFieldMapping('shipping_fee', 'loose_amount');

      expect(registry.hasComparator('loose_amount')).toBe(true);
      expect(registry.resolve('shipping_fee')).toEqual({
        kind: 'amount',
        tolerance: 5,
        inclusive: true,
      });
    });

    it('should reject negative tolerances', () => {
      const registry = new ComparatorRegistry();

      expect(() =>
        registry.registerComparator('broken', { kind: 'amount', tolerance: -1, inclusive: false })
      ).toThrow(AppError);
      expect(registry.hasComparator('broken')).toBe(false);
    });
  });

  describe('isolation', () => {
    it('should not share bindings between instances', () => {
      const first = new ComparatorRegistry();
      const second = new ComparatorRegistry();

      first.addFieldMapping('issuer', 'company_name');

      expect(first.getComparatorName('issuer')).toBe('company_name');
      expect(second.getComparatorName('issuer')).toBe('simple');
    });
  });
});
