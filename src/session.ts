/**
 * Scoring session wiring.
 *
 * Builds the registry, item matcher and evaluator for one evaluation session
 * from a scoring configuration. Sessions share nothing, so independent runs
 * can evaluate in parallel.
 */

import type { ScoringConfig } from './config/scoringConfig';
import { AccuracyEvaluator } from './scoring/accuracyEvaluator';
import { ComparatorRegistry, DEFAULT_FIELD_MAPPINGS } from './scoring/comparatorRegistry';
import type { FieldEvaluationResult } from './scoring/fieldResult';
import { ItemMatcher } from './scoring/itemMatcher';
import type { ExternalMatcher, ExtractionRecord, FieldComparator } from './scoring/types';
import { validateWeightTable } from './scoring/weights';

export interface ScoringSessionOptions {
  externalMatcher?: ExternalMatcher;
  /** Extra named comparators, registered before field bindings are applied */
  comparators?: Record<string, FieldComparator>;
}

export interface ScoringSession {
  config: ScoringConfig;
  registry: ComparatorRegistry;
  itemMatcher: ItemMatcher;
  evaluator: AccuracyEvaluator;
  /** Evaluates with the session's configured weights */
  evaluate(expected: ExtractionRecord, actual: ExtractionRecord): Promise<FieldEvaluationResult[]>;
}

/**
 * @throws AppError (CONFIGURATION_ERROR) for invalid weights or unknown comparator names
 */
export function createScoringSession(
  config: ScoringConfig,
  options: ScoringSessionOptions = {}
): ScoringSession {
  validateWeightTable(config.fieldWeights, config.defaultWeight);
  validateWeightTable(config.itemFieldWeights, config.itemDefaultWeight);

  const registry = new ComparatorRegistry(DEFAULT_FIELD_MAPPINGS);
  for (const [name, comparator] of Object.entries(options.comparators ?? {})) {
    registry.registerComparator(name, comparator);
  }
  for (const [fieldName, comparatorName] of Object.entries(config.fieldComparators)) {
    registry.addFieldMapping(fieldName, comparatorName);
  }

  const itemMatcher = new ItemMatcher({
    fieldWeights: config.itemFieldWeights,
    defaultWeight: config.itemDefaultWeight,
    externalMatcher: options.externalMatcher,
  });

  const evaluator = new AccuracyEvaluator({ registry, itemMatcher });

  return {
    config,
    registry,
    itemMatcher,
    evaluator,
    evaluate: (expected, actual) =>
      evaluator.evaluate(expected, actual, config.fieldWeights, config.defaultWeight),
  };
}
