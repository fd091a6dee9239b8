/**
 * Tests for Scoring Session wiring
 */

import { parseScoringConfig } from '../src/config/scoringConfig';
import { ResultAggregator } from '../src/scoring/resultAggregator';
import type { ExternalMatcher } from '../src/scoring/types';
import { createScoringSession } from '../src/session';

describe('createScoringSession', () => {
  const config = parseScoringConfig({
    field_weights: {
      total_price: 3,
      tax_price: 2,
      items: { name: 3, quantity: 2 },
    },
    field_comparators: { total_price: 'total_price', tax_price: 'tax_price' },
  });

  it('should apply configured comparator bindings', async () => {
    const session = createScoringSession(config);

    const results = await session.evaluate(
      { total_price: 10000, tax_price: 1000 },
      { total_price: '10,000.5', tax_price: 1010 }
    );

    // total_price tolerates < 1.0, tax_price tolerates <= 10
    expect(results.map((result) => result.isCorrect)).toEqual([true, true]);
    expect(results.map((result) => result.score)).toEqual([3, 2]);
  });

  it('should use configured weights for item sub-fields', async () => {
    const session = createScoringSession(config);

    const results = await session.evaluate(
      { items: [{ name: 'Bolt', quantity: 4 }] },
      { items: [{ name: 'bolt', quantity: 5 }] }
    );

    expect(results.map((result) => [result.displayName, result.weight, result.isCorrect])).toEqual([
      ['items.name[0]', 3, true],
      ['items.quantity[0]', 2, false],
    ]);
    // Pair score: name 3 of (3 + 2)
    expect(results[0].details).toEqual({ match_score: 0.6 });
    expect(new ResultAggregator(results).calculateOverallAccuracy()).toBe(0.6);
  });

  it('should register extra comparators before bindings', async () => {
    const session = createScoringSession(
      parseScoringConfig({ field_comparators: { sub_total: 'loose_amount' } }),
      { comparators: { loose_amount: { kind: 'amount', tolerance: 100, inclusive: true } } }
    );

    const [result] = await session.evaluate({ sub_total: 5000 }, { sub_total: 5100 });

    expect(session.registry.getComparatorName('sub_total')).toBe('loose_amount');
    expect(result.isCorrect).toBe(true);
  });

  it('should reject a binding to an unknown comparator', () => {
    expect(() =>
      createScoringSession(parseScoringConfig({ field_comparators: { issuer: 'fuzzy' } }))
    ).toThrow('Unknown comparator "fuzzy" for field "issuer"');
  });

  it('should pass the external matcher to the item matcher', async () => {
    const external: ExternalMatcher = () => [[0, 0, 0.7]];
    const session = createScoringSession(config, { externalMatcher: external });

    const results = await session.evaluate(
      { items: [{ name: 'Bolt' }] },
      { items: [{ name: 'Anchor' }] }
    );

    expect(session.itemMatcher.usesExternalMatcher).toBe(true);
    expect(results[0].details).toEqual({ match_score: 0.7 });
  });

  it('should keep sessions independent', () => {
    const first = createScoringSession(config);
    const second = createScoringSession(config);

    first.registry.addFieldMapping('issuer', 'company_name');

    expect(second.registry.getComparatorName('issuer')).toBe('simple');
  });
});
