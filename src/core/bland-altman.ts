/**
 * Bland-Altman agreement analysis.
 *
 * Compares two methods through the per-pair difference plotted against the
 * per-pair mean: bias (mean difference), limits of agreement at
 * bias ± z·SD, and Student-t confidence intervals around all three lines.
 */

import type { Logger } from 'pino';
import type {
  BlandAltmanIntervals,
  BlandAltmanOptions,
  BlandAltmanResult,
  DifferenceMode,
  MeasurementSeries,
  MeasurementValues,
} from '../types/index.js';
import { BlandAltmanOptionsSchema } from '../types/schemas/index.js';
import { BLAND_ALTMAN, MIN_PAIRS } from '../config/defaults.js';
import { ComparisonError } from '../api/errors.js';
import { assertValidMeasurements, parseOptions } from '../api/validators.js';
import { resultifySync, type Result } from '../utils/result-helpers.js';
import { mean, sampleStdDev } from '../utils/math-helpers.js';
import { lazyLog } from '../utils/logger-helpers.js';
import { studentTCritical, symmetricInterval } from './confidence-interval.js';

/**
 * Per-pair difference in the requested mode.
 *
 * @throws {ComparisonError} DivisionByZero when a relative difference has a zero pair mean
 */
function pairDifferences(series: MeasurementSeries, means: readonly number[], mode: DifferenceMode): number[] {
  return series.map(({ x, y }, index) => {
    const difference = y - x;
    if (mode === 'absolute') {
      return difference;
    }

    const pairMean = means[index];
    if (pairMean === 0) {
      throw new ComparisonError(
        'DivisionByZero',
        `Relative difference is undefined for pair ${index}: the mean of both methods is 0`,
        { index }
      );
    }
    return (difference / pairMean) * 100;
  });
}

function agreementIntervals(
  bias: number,
  sd: number,
  lowerLimit: number,
  upperLimit: number,
  n: number,
  confidenceLevel: number
): BlandAltmanIntervals {
  const t = studentTCritical(confidenceLevel, n - 1);
  const biasHalfWidth = t * (sd / Math.sqrt(n));
  // Var of a normal quantile estimate ≈ 3σ²/n
  const limitHalfWidth = t * sd * Math.sqrt(3 / n);

  return Object.freeze({
    bias: symmetricInterval(bias, biasHalfWidth),
    lowerLimit: symmetricInterval(lowerLimit, limitHalfWidth),
    upperLimit: symmetricInterval(upperLimit, limitHalfWidth),
  });
}

/**
 * Compute Bland-Altman statistics for a validated series.
 *
 * @param series - At least two validated pairs
 * @param options - Options already checked against BlandAltmanOptionsSchema
 * @param logger - Optional pino logger for debug summaries
 * @throws {ComparisonError} DivisionByZero in relative mode
 */
export function computeBlandAltman(
  series: MeasurementSeries,
  options: BlandAltmanOptions = {},
  logger?: Logger
): BlandAltmanResult {
  const mode = options.mode ?? BLAND_ALTMAN.DEFAULT_MODE;
  const zMultiplier = options.zMultiplier ?? BLAND_ALTMAN.DEFAULT_Z_MULTIPLIER;
  const confidenceLevel =
    options.confidenceLevel === undefined ? BLAND_ALTMAN.DEFAULT_CONFIDENCE_LEVEL : options.confidenceLevel;

  const n = series.length;
  const means = series.map(({ x, y }) => (x + y) / 2);
  const differences = pairDifferences(series, means, mode);

  const bias = mean(differences);
  const sdDifferences = sampleStdDev(differences);
  const spread = zMultiplier * sdDifferences;
  const lowerLimit = bias - spread;
  const upperLimit = bias + spread;

  const confidenceIntervals =
    confidenceLevel === null
      ? null
      : agreementIntervals(bias, sdDifferences, lowerLimit, upperLimit, n, confidenceLevel);

  lazyLog(
    logger,
    'debug',
    () => ({ analysis: 'bland-altman', n, mode, bias, sdDifferences, lowerLimit, upperLimit }),
    'Bland-Altman statistics computed'
  );

  return Object.freeze({
    n,
    mode,
    zMultiplier,
    confidenceLevel,
    means: Object.freeze(means),
    differences: Object.freeze(differences),
    bias,
    sdDifferences,
    lowerLimit,
    upperLimit,
    confidenceIntervals,
  });
}

/**
 * Bland-Altman analysis of two paired measurement sequences.
 *
 * Never throws: invalid input or options come back as `Err`.
 *
 * @example
 * ```typescript
 * const result = blandAltman([1, 2, 3, 4, 5], [1.1, 2.0, 3.2, 3.9, 5.3]);
 * if (result.ok) {
 *   console.log(result.val.bias); // ≈ 0.1
 * }
 * ```
 */
export function blandAltman(
  method1: MeasurementValues,
  method2: MeasurementValues,
  options?: BlandAltmanOptions,
  logger?: Logger
): Result<BlandAltmanResult, ComparisonError> {
  return resultifySync(() => {
    const series = assertValidMeasurements(method1, method2, {
      minPairs: MIN_PAIRS.BLAND_ALTMAN,
      analysis: 'Bland-Altman',
    });
    const parsed = parseOptions(BlandAltmanOptionsSchema, options);
    return computeBlandAltman(series, parsed, logger);
  });
}
