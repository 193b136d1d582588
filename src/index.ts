export { MethodComparer, createComparer, type ComparerOptions, type ComparerDependencies } from './api/comparer.js';
export {
  ComparisonError,
  toComparisonError,
  zodErrorToComparisonError,
  type ComparisonErrorCode,
  type ComparisonErrorShape,
} from './api/errors.js';
export * from './api/validators.js';
export type * from './api/events.js';

// Analyses
export { blandAltman, computeBlandAltman } from './core/bland-altman.js';
export {
  passingBablok,
  computePassingBablok,
  pairwiseSlopes,
  shiftedMedian,
  type PairwiseSlopes,
} from './core/passing-bablok.js';
export { deming, computeDeming, fitDeming, type DemingFit } from './core/deming.js';
export { linearRegression, computeLinearRegression } from './core/linear-regression.js';
export { mountain, computeMountain } from './core/mountain.js';
export { clarkeZones, clarkeZone, computeClarkeZones } from './core/clarke-error-grid.js';
export { parkesZones, parkesZone, computeParkesZones } from './core/parkes-error-grid.js';
export * from './core/confidence-interval.js';

// Configuration
export {
  BLAND_ALTMAN,
  PASSING_BABLOK,
  DEMING,
  LINEAR,
  MOUNTAIN,
  CLARKE,
  PARKES,
  MIN_PAIRS,
  LOGGING,
  DEFAULT_ANALYSIS_CONFIG,
  mergeConfig,
  resolveLogLevel,
} from './config/defaults.js';
export { parseProfile, validateConfig, resolveConfig, type ResolveConfigOptions } from './config/loader.js';

export { resultifySync, unwrap, getOrDefault, mapResult, chainResult, Ok, Err } from './utils/result-helpers.js';
export type { Result } from './utils/result-helpers.js';

export * from './types/index.js';
export * from './types/schemas/index.js';
