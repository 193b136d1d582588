/**
 * Input validators for method-agreement
 *
 * Checks paired measurement arrays and option objects once, at entry, so
 * no analysis ever runs on partially invalid data.
 */

import type { ZodTypeAny, output } from 'zod';
import type { MeasurementPair, MeasurementSeries, MeasurementValues } from '../types/index.js';
import {
  ComparisonError,
  insufficientData,
  shapeMismatch,
  zodErrorToComparisonError,
  type ComparisonErrorCode,
} from './errors.js';

/**
 * A single failed precondition
 */
export interface ValidationIssue {
  code: ComparisonErrorCode;
  message: string;
  /** Offending pair index, for InvalidValue */
  index?: number;
  /** Which input held the offending value, for InvalidValue */
  method?: 'method1' | 'method2';
}

/**
 * Validation result type
 */
export interface ValidationResult {
  valid: boolean;
  issues: ValidationIssue[];
}

export interface SeriesValidationOptions {
  /** Fewest pairs the analysis can work with. @default 2 */
  minPairs?: number;
  /** Analysis name used in InsufficientData messages */
  analysis?: string;
}

const DEFAULT_MIN_PAIRS = 2;

function isArrayLike(value: unknown): value is MeasurementValues {
  if (Array.isArray(value)) {
    return true;
  }
  // Typed arrays and other indexable sequences
  return (
    typeof value === 'object' &&
    value !== null &&
    'length' in value &&
    typeof value.length === 'number' &&
    Number.isInteger(value.length) &&
    value.length >= 0
  );
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

interface Inspection {
  issues: ValidationIssue[];
  series: MeasurementSeries | null;
}

function inspectMeasurements(
  method1: unknown,
  method2: unknown,
  options: SeriesValidationOptions
): Inspection {
  const issues: ValidationIssue[] = [];
  const minPairs = options.minPairs ?? DEFAULT_MIN_PAIRS;

  if (!isArrayLike(method1) || !isArrayLike(method2)) {
    issues.push({
      code: 'InvalidParams',
      message: 'method1 and method2 must both be arrays of numbers',
    });
    return { issues, series: null };
  }

  if (method1.length !== method2.length) {
    const error = shapeMismatch(method1.length, method2.length);
    issues.push({ code: error.code, message: error.message });
    return { issues, series: null };
  }

  const pairs: MeasurementPair[] = [];
  for (let i = 0; i < method1.length; i++) {
    const x: unknown = method1[i];
    const y: unknown = method2[i];
    if (!isFiniteNumber(x)) {
      issues.push({
        code: 'InvalidValue',
        message: `method1[${i}] must be a finite number, got ${String(x)}`,
        index: i,
        method: 'method1',
      });
    }
    if (!isFiniteNumber(y)) {
      issues.push({
        code: 'InvalidValue',
        message: `method2[${i}] must be a finite number, got ${String(y)}`,
        index: i,
        method: 'method2',
      });
    }
    if (isFiniteNumber(x) && isFiniteNumber(y)) {
      pairs.push(Object.freeze({ x, y }));
    }
  }

  if (issues.length > 0) {
    return { issues, series: null };
  }

  if (pairs.length < minPairs) {
    const error = insufficientData(pairs.length, minPairs, options.analysis);
    issues.push({ code: error.code, message: error.message });
    return { issues, series: null };
  }

  return { issues, series: Object.freeze(pairs) };
}

/**
 * Validate two paired measurement sequences.
 *
 * Checks run in a fixed order and stop at the first failing stage:
 * array-likeness, equal length, finiteness (x before y at each index),
 * minimum count. Length is checked before any element is read.
 *
 * @param method1 - Values from method 1 (x)
 * @param method2 - Values from method 2 (y)
 * @returns Validation result with issues if any
 */
export function validateMeasurements(
  method1: unknown,
  method2: unknown,
  options: SeriesValidationOptions = {}
): ValidationResult {
  const { issues } = inspectMeasurements(method1, method2, options);
  return {
    valid: issues.length === 0,
    issues,
  };
}

/**
 * Turn a validation issue into the error an analysis reports
 */
export function issueToError(issue: ValidationIssue): ComparisonError {
  const details: Record<string, unknown> = {};
  if (issue.index !== undefined) details.index = issue.index;
  if (issue.method !== undefined) details.method = issue.method;
  return new ComparisonError(issue.code, issue.message, Object.keys(details).length > 0 ? details : undefined);
}

/**
 * Assert that two sequences form a valid series, returning the pairs.
 *
 * @throws {ComparisonError} for the first issue found
 */
export function assertValidMeasurements(
  method1: unknown,
  method2: unknown,
  options: SeriesValidationOptions = {}
): MeasurementSeries {
  const { issues, series } = inspectMeasurements(method1, method2, options);
  const [firstIssue] = issues;
  if (firstIssue) {
    throw issueToError(firstIssue);
  }
  if (!series) {
    throw new ComparisonError('InvalidParams', 'Measurements could not be paired');
  }
  return series;
}

/**
 * Parse an options object against its schema.
 *
 * `undefined` is treated as an empty options object.
 *
 * @throws {ComparisonError} InvalidParams naming the first failing field
 */
export function parseOptions<S extends ZodTypeAny>(schema: S, options: unknown): output<S> {
  const result = schema.safeParse(options ?? {});
  if (!result.success) {
    throw zodErrorToComparisonError(result.error);
  }
  return result.data;
}

/**
 * Clamp a number to a specified range.
 */
export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}
