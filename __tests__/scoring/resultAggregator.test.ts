/**
 * Tests for Result Aggregator
 */

import { FieldEvaluationResult } from '../../src/scoring/fieldResult';
import { ResultAggregator } from '../../src/scoring/resultAggregator';

describe('ResultAggregator', () => {
  // ============================================
  // Test fixtures
  // ============================================

  const results = [
    FieldEvaluationResult.createCorrect('total_price', 1000, '1,000', 3),
    FieldEvaluationResult.createIncorrect('issuer', 'Acme', 'Acne', 1),
    FieldEvaluationResult.createCorrect('items.name', 'Bolt', 'bolt', 2, { itemIndex: 0 }),
    FieldEvaluationResult.createIncorrect('items.price', 50, 55, 2, { itemIndex: 0 }),
    FieldEvaluationResult.createCorrect('items.name', 'Washer', 'washer', 2, { itemIndex: 1 }),
    FieldEvaluationResult.createCorrect('items.price', 5, 5, 2, { itemIndex: 1 }),
  ];

  const aggregator = new ResultAggregator(results);

  describe('filters', () => {
    it('should select results by field name', () => {
      expect(aggregator.getByFieldName('items.name').map((result) => result.actualValue)).toEqual([
        'bolt',
        'washer',
      ]);
      expect(aggregator.getByFieldName('destination')).toEqual([]);
    });

    it('should select results by item index', () => {
      expect(aggregator.getByItemIndex(1).map((result) => result.fieldName)).toEqual([
        'items.name',
        'items.price',
      ]);
    });

    it('should find a single result by field and item', () => {
      expect(aggregator.getByFieldAndItem('items.price', 0)?.actualValue).toBe(55);
      expect(aggregator.getByFieldAndItem('items.price', 5)).toBeUndefined();
    });

    it('should split item and non-item results', () => {
      expect(aggregator.getItemsResults()).toHaveLength(4);
      expect(aggregator.getNonItemsResults().map((result) => result.fieldName)).toEqual([
        'total_price',
        'issuer',
      ]);
    });
  });

  describe('calculateOverallAccuracy', () => {
    it('should divide total score by total weight', () => {
      // (3 + 2 + 2 + 2) / (3 + 1 + 2 + 2 + 2 + 2)
      expect(aggregator.calculateOverallAccuracy()).toBeCloseTo(9 / 12, 10);
    });

    it('should return 0 for no results', () => {
      expect(new ResultAggregator([]).calculateOverallAccuracy()).toBe(0);
    });

    it('should return 0 when every weight is 0', () => {
      const zeroWeight = new ResultAggregator([
        FieldEvaluationResult.createCorrect('issuer', 'Acme', 'Acme', 0),
      ]);

      expect(zeroWeight.calculateOverallAccuracy()).toBe(0);
    });
  });

  describe('calculateItemsAccuracy', () => {
    it('should consider item sub-fields only', () => {
      expect(aggregator.calculateItemsAccuracy()).toBe(0.75);
    });
  });

  describe('getItemSummary', () => {
    it('should summarize each aligned pair', () => {
      const summary = aggregator.getItemSummary();

      expect([...summary.keys()]).toEqual([0, 1]);
      expect(summary.get(0)).toEqual({
        accuracy: 0.5,
        totalScore: 2,
        totalWeight: 4,
        fieldCount: 2,
      });
      expect(summary.get(1)).toEqual({
        accuracy: 1,
        totalScore: 4,
        totalWeight: 4,
        fieldCount: 2,
      });
    });
  });

  describe('getFieldAccuracySummary', () => {
    it('should key summaries by display name', () => {
      const summary = aggregator.getFieldAccuracySummary();

      expect(Object.keys(summary)).toEqual([
        'total_price',
        'issuer',
        'items.name[0]',
        'items.price[0]',
        'items.name[1]',
        'items.price[1]',
      ]);
      expect(summary.issuer).toEqual({
        accuracy: 0,
        weightedAccuracy: 0,
        correctCount: 0,
        totalCount: 1,
        totalScore: 0,
        totalWeight: 1,
      });
      expect(summary['items.name[0]'].weightedAccuracy).toBe(1);
    });

    it('should pool repeated field names', () => {
      const summary = new ResultAggregator([
        FieldEvaluationResult.createCorrect('note', 'a', 'a', 1),
        FieldEvaluationResult.createIncorrect('note', 'b', 'c', 3),
      ]).getFieldAccuracySummary();

      expect(summary.note).toEqual({
        accuracy: 0.5,
        weightedAccuracy: 0.25,
        correctCount: 1,
        totalCount: 2,
        totalScore: 1,
        totalWeight: 4,
      });
    });
  });

  describe('getFieldAccuracies', () => {
    it('should map display names to correctness', () => {
      expect(aggregator.getFieldAccuracies()).toEqual({
        total_price: true,
        issuer: false,
        'items.name[0]': true,
        'items.price[0]': false,
        'items.name[1]': true,
        'items.price[1]': true,
      });
    });
  });

  it('should not be affected by later changes to the input list', () => {
    const input = [FieldEvaluationResult.createCorrect('issuer', 'Acme', 'Acme', 1)];
    const snapshotAggregator = new ResultAggregator(input);

    input.push(FieldEvaluationResult.createIncorrect('issuer', 'Acme', 'x', 1));

    expect(snapshotAggregator.calculateOverallAccuracy()).toBe(1);
  });
});
