/**
 * Mountain plot statistics.
 *
 * Folds the empirical CDF of the paired differences at the median, which
 * shows bias (where the peak sits) and spread (how wide the mountain is).
 * The area under the folded curve is the mean absolute deviation from the
 * median.
 */

import type { Logger } from 'pino';
import type {
  MeasurementSeries,
  MeasurementValues,
  MountainOptions,
  MountainResult,
} from '../types/index.js';
import { MountainOptionsSchema } from '../types/schemas/index.js';
import { MIN_PAIRS, MOUNTAIN } from '../config/defaults.js';
import type { ComparisonError } from '../api/errors.js';
import { assertValidMeasurements, parseOptions } from '../api/validators.js';
import { linspace, quantileSorted, sortedCopy } from '../utils/math-helpers.js';
import { lazyLog } from '../utils/logger-helpers.js';
import { resultifySync, type Result } from '../utils/result-helpers.js';
import { orderedInterval } from './confidence-interval.js';

function closestIndex(values: readonly number[], target: number): number {
  let best = 0;
  for (let i = 1; i < values.length; i++) {
    if (Math.abs(values[i] - target) < Math.abs(values[best] - target)) {
      best = i;
    }
  }
  return best;
}

/**
 * Folded CDF of y - x for a validated series
 */
export function computeMountain(
  series: MeasurementSeries,
  options: MountainOptions = {},
  logger?: Logger
): MountainResult {
  const percentiles = options.percentiles ?? MOUNTAIN.DEFAULT_PERCENTILES;
  const centralRange = options.centralRange ?? MOUNTAIN.DEFAULT_CENTRAL_RANGE;
  const n = series.length;

  const differences = sortedCopy(series.map(({ x, y }) => y - x));
  const probabilities = linspace(0, 1, percentiles);
  const quantiles = probabilities.map((p) => quantileSorted(differences, p));
  const mountain = probabilities.map((p) => (p < 0.5 ? p : 1 - p) * 100);

  let auc = 0;
  for (let j = 0; j < quantiles.length - 1; j++) {
    auc += ((quantiles[j + 1] - quantiles[j]) * (mountain[j] + mountain[j + 1])) / 2;
  }

  const medianIndex = Math.floor(percentiles / 2);
  const lowerBound = quantileSorted(differences, 0.5 - centralRange / 200);
  const upperBound = quantileSorted(differences, 0.5 + centralRange / 200);
  const rangeIndex: readonly [number, number] = Object.freeze([
    closestIndex(quantiles, lowerBound),
    closestIndex(quantiles, upperBound),
  ] as const);

  lazyLog(
    logger,
    'debug',
    () => ({ analysis: 'mountain', n, percentiles, auc, median: quantiles[medianIndex] }),
    'Mountain statistics computed'
  );

  return Object.freeze({
    n,
    probabilities: Object.freeze(probabilities),
    quantiles: Object.freeze(quantiles),
    mountain: Object.freeze(mountain),
    auc,
    median: quantiles[medianIndex],
    medianIndex,
    centralRange,
    rangeBounds: orderedInterval(lowerBound, upperBound),
    rangeIndex,
  });
}

/**
 * Mountain plot statistics for two paired measurement sequences.
 */
export function mountain(
  method1: MeasurementValues,
  method2: MeasurementValues,
  options?: MountainOptions,
  logger?: Logger
): Result<MountainResult, ComparisonError> {
  return resultifySync(() => {
    const series = assertValidMeasurements(method1, method2, {
      minPairs: MIN_PAIRS.MOUNTAIN,
      analysis: 'mountain plot',
    });
    const parsed = parseOptions(MountainOptionsSchema, options);
    return computeMountain(series, parsed, logger);
  });
}
