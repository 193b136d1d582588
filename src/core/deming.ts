/**
 * Deming regression.
 *
 * Errors-in-variables fit for two methods that both measure with error,
 * given the ratio of their error variances. Intervals and standard errors
 * come from a seeded pair bootstrap, so repeated calls with the same seed
 * return identical results.
 */

import type { Logger } from 'pino';
import type {
  BootstrapEstimate,
  DemingOptions,
  DemingResult,
  MeasurementSeries,
  MeasurementValues,
} from '../types/index.js';
import { DemingOptionsSchema } from '../types/schemas/index.js';
import { DEMING, MIN_PAIRS } from '../config/defaults.js';
import { ComparisonError } from '../api/errors.js';
import { assertValidMeasurements, parseOptions } from '../api/validators.js';
import { mean, quantileSorted, sampleStdDev, sortedCopy } from '../utils/math-helpers.js';
import { createSeededRandom, randomIndex, type RandomSource } from '../utils/random.js';
import { lazyLog } from '../utils/logger-helpers.js';
import { resultifySync, type Result } from '../utils/result-helpers.js';
import { orderedInterval } from './confidence-interval.js';

/**
 * Parameters of a single Deming fit
 */
export interface DemingFit {
  slope: number;
  intercept: number;
  sigmaX: number;
  sigmaY: number;
}

/**
 * Closed-form Deming fit, or `null` when the cross-product sum is zero
 * and the slope is undefined.
 *
 * @param varianceRatio - λ, the error variance of y over that of x
 */
export function fitDeming(series: MeasurementSeries, varianceRatio: number): DemingFit | null {
  const n = series.length;
  const meanX = mean(series.map((pair) => pair.x));
  const meanY = mean(series.map((pair) => pair.y));

  let sxx = 0;
  let syy = 0;
  let sxy = 0;
  for (const { x, y } of series) {
    const dx = x - meanX;
    const dy = y - meanY;
    sxx += dx * dx;
    syy += dy * dy;
    sxy += dx * dy;
  }

  if (sxy === 0) {
    return null;
  }

  const lambda = varianceRatio;
  const spread = syy - lambda * sxx;
  const slope = (spread + Math.sqrt(spread * spread + 4 * lambda * sxy * sxy)) / (2 * sxy);
  const intercept = meanY - slope * meanX;

  let residualX = 0;
  let residualY = 0;
  for (const { x, y } of series) {
    // Latent true value under the fitted line
    const xi = (lambda * x + slope * (y - intercept)) / (lambda + slope * slope);
    const dx = x - xi;
    const dy = y - intercept - slope * xi;
    residualX += dx * dx;
    residualY += dy * dy;
  }

  const sigmaSquared = (lambda * residualX + residualY) / (2 * lambda * (n - 2));

  return {
    slope,
    intercept,
    sigmaX: Math.sqrt(sigmaSquared),
    sigmaY: Math.sqrt(lambda * sigmaSquared),
  };
}

function resample(series: MeasurementSeries, random: RandomSource): MeasurementSeries {
  return Array.from({ length: series.length }, () => series[randomIndex(random, series.length)]);
}

function summarize(estimate: number, samples: number[], confidenceLevel: number): BootstrapEstimate {
  const sorted = sortedCopy(samples);
  const tail = (1 - confidenceLevel) / 2;
  return Object.freeze({
    estimate,
    bootstrapMedian: quantileSorted(sorted, 0.5),
    ci: orderedInterval(quantileSorted(sorted, tail), quantileSorted(sorted, 1 - tail)),
    standardError: sampleStdDev(samples),
  });
}

function pointOnly(estimate: number): BootstrapEstimate {
  return Object.freeze({ estimate, bootstrapMedian: null, ci: null, standardError: null });
}

/**
 * Fit a Deming line to a validated series.
 *
 * @throws {ComparisonError} DegenerateRegression when x and y do not co-vary
 */
export function computeDeming(
  series: MeasurementSeries,
  options: DemingOptions = {},
  logger?: Logger
): DemingResult {
  const confidenceLevel = options.confidenceLevel ?? DEMING.DEFAULT_CONFIDENCE_LEVEL;
  const varianceRatio = options.varianceRatio ?? DEMING.DEFAULT_VARIANCE_RATIO;
  const bootstrap = options.bootstrap === undefined ? DEMING.DEFAULT_BOOTSTRAP : options.bootstrap;
  const seed = options.seed ?? DEMING.DEFAULT_SEED;
  const n = series.length;

  const fit = fitDeming(series, varianceRatio);
  if (!fit) {
    throw new ComparisonError(
      'DegenerateRegression',
      'Deming slope is undefined: method 1 and method 2 have zero covariance'
    );
  }

  if (bootstrap === null) {
    lazyLog(logger, 'debug', () => ({ analysis: 'deming', n, ...fit }), 'Deming fit computed');
    return Object.freeze({
      n,
      confidenceLevel,
      varianceRatio,
      slope: pointOnly(fit.slope),
      intercept: pointOnly(fit.intercept),
      sigmaX: pointOnly(fit.sigmaX),
      sigmaY: pointOnly(fit.sigmaY),
      bootstrapSamples: 0,
    });
  }

  const random = createSeededRandom(seed);
  const fits: DemingFit[] = [];
  for (let b = 0; b < bootstrap; b++) {
    const resampled = fitDeming(resample(series, random), varianceRatio);
    if (resampled) {
      fits.push(resampled);
    }
  }

  if (fits.length === 0) {
    throw new ComparisonError(
      'DegenerateRegression',
      `None of the ${bootstrap} bootstrap resamples produced a defined Deming slope`,
      { bootstrap }
    );
  }

  const skipped = bootstrap - fits.length;
  if (skipped > 0) {
    lazyLog(
      logger,
      'debug',
      () => ({ analysis: 'deming', skipped, bootstrap }),
      'Skipped bootstrap resamples with zero covariance'
    );
  }

  lazyLog(
    logger,
    'debug',
    () => ({ analysis: 'deming', n, ...fit, bootstrapSamples: fits.length, seed }),
    'Deming fit computed'
  );

  return Object.freeze({
    n,
    confidenceLevel,
    varianceRatio,
    slope: summarize(fit.slope, fits.map((f) => f.slope), confidenceLevel),
    intercept: summarize(fit.intercept, fits.map((f) => f.intercept), confidenceLevel),
    sigmaX: summarize(fit.sigmaX, fits.map((f) => f.sigmaX), confidenceLevel),
    sigmaY: summarize(fit.sigmaY, fits.map((f) => f.sigmaY), confidenceLevel),
    bootstrapSamples: fits.length,
  });
}

/**
 * Deming regression of method 2 on method 1.
 *
 * @example
 * ```typescript
 * const result = deming(reference, candidate, { varianceRatio: 2, seed: 'run-1' });
 * ```
 */
export function deming(
  method1: MeasurementValues,
  method2: MeasurementValues,
  options?: DemingOptions,
  logger?: Logger
): Result<DemingResult, ComparisonError> {
  return resultifySync(() => {
    const series = assertValidMeasurements(method1, method2, {
      minPairs: MIN_PAIRS.DEMING,
      analysis: 'Deming regression',
    });
    const parsed = parseOptions(DemingOptionsSchema, options);
    return computeDeming(series, parsed, logger);
  });
}
