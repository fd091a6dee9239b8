/**
 * Tests for Scoring Configuration
 */

import fs from 'fs';
import os from 'os';
import path from 'path';
import {
  DEFAULT_SCORING_CONFIG_PATH,
  loadScoringConfig,
  parseScoringConfig,
} from '../../src/config/scoringConfig';
import { AppError } from '../../src/utils/AppError';

const captureError = (run: () => unknown): unknown => {
  try {
    run();
  } catch (error) {
    return error;
  }
  return undefined;
};

describe('Scoring Configuration', () => {
  describe('parseScoringConfig', () => {
    it('should flatten nested item weights into dotted keys', () => {
      const config = parseScoringConfig({
        field_weights: {
          default_weight: 0.5,
          total_price: 3,
          items: { name: 2, quantity: 1.5 },
        },
      });

      expect(config.fieldWeights).toEqual({
        total_price: 3,
        'items.name': 2,
        'items.quantity': 1.5,
      });
      expect(config.defaultWeight).toBe(0.5);
      expect(config.itemFieldWeights).toEqual({ name: 2, quantity: 1.5 });
      expect(config.itemDefaultWeight).toBe(0.5);
      expect(config.fieldComparators).toEqual({});
    });

    it('should accept flat dotted item keys', () => {
      const config = parseScoringConfig({
        field_weights: { 'items.price': 4, 'items.default_weight': 2 },
      });

      expect(config.fieldWeights).toEqual({ 'items.price': 4 });
      expect(config.itemFieldWeights).toEqual({ price: 4 });
      expect(config.itemDefaultWeight).toBe(2);
      expect(config.defaultWeight).toBe(1);
    });

    it('should read a nested item default weight', () => {
      const config = parseScoringConfig({
        field_weights: { items: { default_weight: 0.25 } },
      });

      expect(config.itemDefaultWeight).toBe(0.25);
      expect(config.fieldWeights).toEqual({});
    });

    it('should default every section when empty', () => {
      expect(parseScoringConfig({})).toEqual({
        fieldWeights: {},
        defaultWeight: 1,
        itemFieldWeights: {},
        itemDefaultWeight: 1,
        fieldComparators: {},
      });
    });

    it('should keep comparator bindings', () => {
      const config = parseScoringConfig({ field_comparators: { issuer: 'company_name' } });

      expect(config.fieldComparators).toEqual({ issuer: 'company_name' });
    });

    it('should reject a negative weight', () => {
      const error = captureError(() =>
        parseScoringConfig({ field_weights: { total_price: -2 } })
      );

      expect(error).toBeInstanceOf(AppError);
      expect(error).toMatchObject({ code: 'CONFIGURATION_ERROR' });
    });

    it('should reject a non-numeric weight', () => {
      expect(() => parseScoringConfig({ field_weights: { issuer: 'heavy' } })).toThrow(
        /Invalid scoring configuration/
      );
    });

    it('should reject nested weights outside items', () => {
      expect(() => parseScoringConfig({ field_weights: { issuer: { name: 1 } } })).toThrow(
        'Only "items" may hold nested weights, found object under "issuer"'
      );
    });

    it('should reject a non-object configuration', () => {
      expect(() => parseScoringConfig('weights')).toThrow(AppError);
    });
  });

  describe('loadScoringConfig', () => {
    let tempDir: string;

    beforeAll(() => {
      tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'scoring-config-'));
    });

    afterAll(() => {
      fs.rmSync(tempDir, { recursive: true, force: true });
    });

    it('should load the bundled configuration', () => {
      const config = loadScoringConfig(DEFAULT_SCORING_CONFIG_PATH);

      expect(config.defaultWeight).toBe(1);
      expect(config.fieldWeights.total_price).toBe(3);
      expect(config.fieldWeights.doc_date).toBe(1.5);
      expect(config.fieldWeights['items.name']).toBe(3);
      expect(config.fieldWeights['items.note']).toBe(0.5);
      expect(config.itemFieldWeights.quantity).toBe(2);
      expect(config.fieldComparators).toEqual({
        total_price: 'total_price',
        tax_price: 'tax_price',
      });
    });

    it('should default to the bundled configuration', () => {
      expect(loadScoringConfig()).toEqual(loadScoringConfig(DEFAULT_SCORING_CONFIG_PATH));
    });

    it('should load a configuration from a given path', () => {
      const filePath = path.join(tempDir, 'custom.json');
      fs.writeFileSync(filePath, JSON.stringify({ field_weights: { issuer: 4 } }));

      expect(loadScoringConfig(filePath).fieldWeights).toEqual({ issuer: 4 });
    });

    it('should report a missing file as a configuration error', () => {
      const error = captureError(() => loadScoringConfig(path.join(tempDir, 'missing.json')));

      expect(error).toBeInstanceOf(AppError);
      expect(error).toMatchObject({ code: 'CONFIGURATION_ERROR' });
    });

    it('should report malformed JSON as a configuration error', () => {
      const filePath = path.join(tempDir, 'broken.json');
      fs.writeFileSync(filePath, '{ "field_weights": ');

      expect(() => loadScoringConfig(filePath)).toThrow(/is not valid JSON/);
    });
  });
});
