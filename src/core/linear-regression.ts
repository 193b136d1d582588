/**
 * Ordinary least-squares regression of method 2 on method 1.
 *
 * Treats method 1 as error-free. Included as the baseline the robust and
 * errors-in-variables fits are usually compared against.
 */

import type { Logger } from 'pino';
import type {
  LinearRegressionOptions,
  LinearRegressionResult,
  MeasurementSeries,
  MeasurementValues,
} from '../types/index.js';
import { LinearRegressionOptionsSchema } from '../types/schemas/index.js';
import { LINEAR, MIN_PAIRS } from '../config/defaults.js';
import { ComparisonError } from '../api/errors.js';
import { assertValidMeasurements, parseOptions } from '../api/validators.js';
import { mean } from '../utils/math-helpers.js';
import { lazyLog } from '../utils/logger-helpers.js';
import { resultifySync, type Result } from '../utils/result-helpers.js';
import { studentTCritical, symmetricInterval } from './confidence-interval.js';

/**
 * Fit y = intercept + slope·x by least squares on a validated series.
 *
 * @throws {ComparisonError} DegenerateRegression when every x is equal
 */
export function computeLinearRegression(
  series: MeasurementSeries,
  options: LinearRegressionOptions = {},
  logger?: Logger
): LinearRegressionResult {
  const confidenceLevel = options.confidenceLevel ?? LINEAR.DEFAULT_CONFIDENCE_LEVEL;
  const n = series.length;
  const meanX = mean(series.map((pair) => pair.x));
  const meanY = mean(series.map((pair) => pair.y));

  let sxx = 0;
  let syy = 0;
  let sxy = 0;
  for (const { x, y } of series) {
    sxx += (x - meanX) * (x - meanX);
    syy += (y - meanY) * (y - meanY);
    sxy += (x - meanX) * (y - meanY);
  }

  if (sxx === 0) {
    throw new ComparisonError(
      'DegenerateRegression',
      'Least-squares slope is undefined: every method 1 value is equal'
    );
  }

  const slope = sxy / sxx;
  const intercept = meanY - slope * meanX;

  let residualSumOfSquares = 0;
  for (const { x, y } of series) {
    const residual = y - (intercept + slope * x);
    residualSumOfSquares += residual * residual;
  }

  const degreesOfFreedom = n - 2;
  const residualStandardError = Math.sqrt(residualSumOfSquares / degreesOfFreedom);
  const slopeStandardError = residualStandardError / Math.sqrt(sxx);
  const interceptStandardError = residualStandardError * Math.sqrt(1 / n + (meanX * meanX) / sxx);
  // A constant y is fitted exactly
  const rSquared = syy === 0 ? 1 : 1 - residualSumOfSquares / syy;

  const t = studentTCritical(confidenceLevel, degreesOfFreedom);

  lazyLog(
    logger,
    'debug',
    () => ({ analysis: 'linear', n, slope, intercept, rSquared }),
    'Least-squares fit computed'
  );

  return Object.freeze({
    n,
    confidenceLevel,
    slope,
    intercept,
    slopeCI: symmetricInterval(slope, t * slopeStandardError),
    interceptCI: symmetricInterval(intercept, t * interceptStandardError),
    slopeStandardError,
    interceptStandardError,
    residualStandardError,
    rSquared,
  });
}

/**
 * Least-squares regression of method 2 on method 1.
 */
export function linearRegression(
  method1: MeasurementValues,
  method2: MeasurementValues,
  options?: LinearRegressionOptions,
  logger?: Logger
): Result<LinearRegressionResult, ComparisonError> {
  return resultifySync(() => {
    const series = assertValidMeasurements(method1, method2, {
      minPairs: MIN_PAIRS.LINEAR,
      analysis: 'linear regression',
    });
    const parsed = parseOptions(LinearRegressionOptionsSchema, options);
    return computeLinearRegression(series, parsed, logger);
  });
}
