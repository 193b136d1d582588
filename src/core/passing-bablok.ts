/**
 * Passing-Bablok robust regression.
 *
 * The slope is a shifted median of all pairwise slopes, which makes the fit
 * insensitive to outliers and to the distribution of the errors in either
 * method. The slope interval comes from positions around that median, and the
 * intercept follows from the medians of both methods.
 */

import type { Logger } from 'pino';
import type {
  Interval,
  MeasurementSeries,
  MeasurementValues,
  PassingBablokDiagnostics,
  PassingBablokOptions,
  PassingBablokResult,
} from '../types/index.js';
import { PassingBablokOptionsSchema } from '../types/schemas/index.js';
import { MIN_PAIRS, PASSING_BABLOK } from '../config/defaults.js';
import { ComparisonError } from '../api/errors.js';
import { assertValidMeasurements, clamp, parseOptions } from '../api/validators.js';
import { median } from '../utils/math-helpers.js';
import { lazyLog } from '../utils/logger-helpers.js';
import { resultifySync, type Result } from '../utils/result-helpers.js';
import { normalCritical, orderedInterval, valueAtPosition } from './confidence-interval.js';

/**
 * Pairwise slopes with the tallies of every excluded pair
 */
export interface PairwiseSlopes {
  /** Kept slopes, ascending */
  slopes: number[];
  excludedVertical: number;
  excludedDuplicate: number;
  excludedMinusOne: number;
}

/**
 * Collect S_ij = (y_j - y_i) / (x_j - x_i) for every i < j.
 *
 * Identical pairs, pairs on a vertical line and slopes of exactly -1 are
 * left out and counted.
 */
export function pairwiseSlopes(series: MeasurementSeries): PairwiseSlopes {
  const slopes: number[] = [];
  let excludedVertical = 0;
  let excludedDuplicate = 0;
  let excludedMinusOne = 0;

  for (let i = 0; i < series.length - 1; i++) {
    const { x: xi, y: yi } = series[i];
    for (let j = i + 1; j < series.length; j++) {
      const dx = series[j].x - xi;
      const dy = series[j].y - yi;

      if (dx === 0) {
        if (dy === 0) {
          excludedDuplicate++;
        } else {
          excludedVertical++;
        }
        continue;
      }

      const slope = dy / dx;
      if (slope === -1) {
        excludedMinusOne++;
        continue;
      }
      slopes.push(slope);
    }
  }

  slopes.sort((a, b) => a - b);
  return { slopes, excludedVertical, excludedDuplicate, excludedMinusOne };
}

/**
 * Median of the ranked slopes, shifted up by `offset` positions
 */
export function shiftedMedian(sorted: readonly number[], offset: number): number {
  const count = sorted.length;
  const at = (position: number): number => sorted[clamp(position, 0, count - 1)];

  if (count % 2 === 1) {
    return at(Math.floor(count / 2) + offset);
  }
  return (at(count / 2 - 1 + offset) + at(count / 2 + offset)) / 2;
}

function slopeInterval(
  sorted: readonly number[],
  offset: number,
  n: number,
  confidenceLevel: number
): Interval {
  const count = sorted.length;
  const w = normalCritical(confidenceLevel) * Math.sqrt((n * (n - 1) * (2 * n + 5)) / 18);
  const lower = Math.round((count - w) / 2) + offset;
  const upper = Math.round((count + w) / 2) + offset;

  return orderedInterval(valueAtPosition(sorted, lower), valueAtPosition(sorted, upper));
}

/**
 * Fit a Passing-Bablok line to a validated series.
 *
 * @throws {ComparisonError} DegenerateRegression when no pairwise slope survives exclusion
 */
export function computePassingBablok(
  series: MeasurementSeries,
  options: PassingBablokOptions = {},
  logger?: Logger
): PassingBablokResult {
  const confidenceLevel = options.confidenceLevel ?? PASSING_BABLOK.DEFAULT_CONFIDENCE_LEVEL;
  const n = series.length;

  const { slopes, excludedVertical, excludedDuplicate, excludedMinusOne } = pairwiseSlopes(series);

  if (excludedVertical > 0) {
    lazyLog(
      logger,
      'warn',
      () => ({ analysis: 'passing-bablok', excludedVertical }),
      'Excluded pairs with equal method 1 values and different method 2 values'
    );
  }

  if (slopes.length === 0) {
    throw new ComparisonError(
      'DegenerateRegression',
      'No pairwise slope could be computed: every pair of points is vertical, identical or has slope -1',
      { excludedVertical, excludedDuplicate, excludedMinusOne }
    );
  }

  const offset = slopes.filter((slope) => slope < -1).length;
  const slope = shiftedMedian(slopes, offset);
  const slopeCI = slopeInterval(slopes, offset, n, confidenceLevel);

  const medianX = median(series.map((pair) => pair.x));
  const medianY = median(series.map((pair) => pair.y));
  const intercept = medianY - slope * medianX;
  const interceptCI = orderedInterval(medianY - slopeCI.lower * medianX, medianY - slopeCI.upper * medianX);

  const ciDegraded = n < PASSING_BABLOK.MIN_PAIRS_FOR_CI;
  if (ciDegraded) {
    lazyLog(
      logger,
      'warn',
      () => ({ analysis: 'passing-bablok', n, required: PASSING_BABLOK.MIN_PAIRS_FOR_CI }),
      'Too few pairs for a reliable Passing-Bablok confidence interval'
    );
  }

  const diagnostics: PassingBablokDiagnostics = Object.freeze({
    slopeCount: slopes.length,
    offset,
    excludedVertical,
    excludedDuplicate,
    excludedMinusOne,
    ciDegraded,
  });

  lazyLog(
    logger,
    'debug',
    () => ({ analysis: 'passing-bablok', n, slope, intercept, ...diagnostics }),
    'Passing-Bablok fit computed'
  );

  return Object.freeze({
    n,
    confidenceLevel,
    slope,
    intercept,
    slopeCI,
    interceptCI,
    slopes: Object.freeze(slopes),
    diagnostics,
  });
}

/**
 * Passing-Bablok regression of method 2 on method 1.
 *
 * @example
 * ```typescript
 * const result = passingBablok([1, 2, 3, 4, 5], [2, 4, 6, 8, 10]);
 * // result.val.slope === 2, result.val.intercept === 0
 * ```
 */
export function passingBablok(
  method1: MeasurementValues,
  method2: MeasurementValues,
  options?: PassingBablokOptions,
  logger?: Logger
): Result<PassingBablokResult, ComparisonError> {
  return resultifySync(() => {
    const series = assertValidMeasurements(method1, method2, {
      minPairs: MIN_PAIRS.PASSING_BABLOK,
      analysis: 'Passing-Bablok',
    });
    const parsed = parseOptions(PassingBablokOptionsSchema, options);
    return computePassingBablok(series, parsed, logger);
  });
}
