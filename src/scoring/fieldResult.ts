/**
 * Field Evaluation Result
 *
 * Immutable outcome of grading one field (or one item sub-field).
 * The score always equals the weight when correct and zero otherwise;
 * the two named constructors are the only way to build one.
 */

import { AppError } from '../utils/AppError';
import type { FieldValue } from './types';

export interface FieldResultOptions {
  itemIndex?: number;
  details?: Record<string, FieldValue>;
}

/** Serialized output contract consumed by reports and persistence. */
export interface FieldEvaluationResultJson {
  field_name: string;
  expected_value: FieldValue;
  actual_value: FieldValue;
  weight: number;
  score: number;
  is_correct: boolean;
  item_index?: number;
  details?: Record<string, FieldValue>;
}

export class FieldEvaluationResult {
  public readonly fieldName: string;
  public readonly expectedValue: FieldValue;
  public readonly actualValue: FieldValue;
  public readonly weight: number;
  public readonly score: number;
  public readonly isCorrect: boolean;
  public readonly itemIndex?: number;
  public readonly details?: Readonly<Record<string, FieldValue>>;

  private constructor(
    fieldName: string,
    expectedValue: FieldValue,
    actualValue: FieldValue,
    weight: number,
    isCorrect: boolean,
    options: FieldResultOptions
  ) {
    if (!Number.isFinite(weight) || weight < 0) {
      throw AppError.invariant(`Weight for "${fieldName}" must be a non-negative number`);
    }
    if (
      options.itemIndex !== undefined &&
      (!Number.isInteger(options.itemIndex) || options.itemIndex < 0)
    ) {
      throw AppError.invariant(`Item index for "${fieldName}" must be a non-negative integer`);
    }

    this.fieldName = fieldName;
    this.expectedValue = expectedValue;
    this.actualValue = actualValue;
    this.weight = weight;
    this.score = isCorrect ? weight : 0;
    this.isCorrect = isCorrect;
    this.itemIndex = options.itemIndex;
    this.details = options.details;

    Object.freeze(this);
  }

  static createCorrect(
    fieldName: string,
    expected: FieldValue,
    actual: FieldValue,
    weight: number,
    options: FieldResultOptions = {}
  ): FieldEvaluationResult {
    return new FieldEvaluationResult(fieldName, expected, actual, weight, true, options);
  }

  static createIncorrect(
    fieldName: string,
    expected: FieldValue,
    actual: FieldValue,
    weight: number,
    options: FieldResultOptions = {}
  ): FieldEvaluationResult {
    return new FieldEvaluationResult(fieldName, expected, actual, weight, false, options);
  }

  static create(
    fieldName: string,
    expected: FieldValue,
    actual: FieldValue,
    weight: number,
    isCorrect: boolean,
    options: FieldResultOptions = {}
  ): FieldEvaluationResult {
    return isCorrect
      ? FieldEvaluationResult.createCorrect(fieldName, expected, actual, weight, options)
      : FieldEvaluationResult.createIncorrect(fieldName, expected, actual, weight, options);
  }

  /** `items.price[2]` for item sub-fields, the plain field name otherwise. */
  get displayName(): string {
    return this.itemIndex !== undefined ? `${this.fieldName}[${this.itemIndex}]` : this.fieldName;
  }

  toJSON(): FieldEvaluationResultJson {
    const json: FieldEvaluationResultJson = {
      field_name: this.fieldName,
      expected_value: this.expectedValue,
      actual_value: this.actualValue,
      weight: this.weight,
      score: this.score,
      is_correct: this.isCorrect,
    };

    if (this.itemIndex !== undefined) {
      json.item_index = this.itemIndex;
    }
    if (this.details) {
      json.details = { ...this.details };
    }

    return json;
  }
}

export default FieldEvaluationResult;
