/**
 * Default Configuration Constants
 *
 * All statistical defaults centralized here. Each analysis call can
 * override them through its options, and a comparer instance can override
 * them through an analysis profile.
 */

import type { AnalysisConfig, AnalysisProfile, LogLevel } from '../types/schemas/config.js';

/**
 * Bland-Altman Configuration
 */
export const BLAND_ALTMAN = {
  /** Difference expressed in measurement units */
  DEFAULT_MODE: 'absolute' as const,

  /** Limits of agreement at ±1.96 SD (~95% coverage under normality) */
  DEFAULT_Z_MULTIPLIER: 1.96,

  /** Confidence level of the bias and limit intervals */
  DEFAULT_CONFIDENCE_LEVEL: 0.95,
} as const;

/**
 * Passing-Bablok Configuration
 */
export const PASSING_BABLOK = {
  DEFAULT_CONFIDENCE_LEVEL: 0.95,

  /** Below this many pairs the rank-based interval is flagged as degraded */
  MIN_PAIRS_FOR_CI: 3,
} as const;

/**
 * Deming Configuration
 */
export const DEMING = {
  DEFAULT_CONFIDENCE_LEVEL: 0.95,

  /** Equal error variance in both methods */
  DEFAULT_VARIANCE_RATIO: 1,

  DEFAULT_BOOTSTRAP: 1000,

  DEFAULT_SEED: 'method-agreement',
} as const;

/**
 * Linear Regression Configuration
 */
export const LINEAR = {
  DEFAULT_CONFIDENCE_LEVEL: 0.95,
} as const;

/**
 * Mountain Plot Configuration
 */
export const MOUNTAIN = {
  DEFAULT_PERCENTILES: 100,

  /** ±1 SD worth of a normal distribution */
  DEFAULT_CENTRAL_RANGE: 68.27,
} as const;

/**
 * Clarke Error Grid Configuration
 */
export const CLARKE = {
  DEFAULT_UNITS: 'mg/dl' as const,

  /** mg/dL per mmol/L for glucose */
  MMOL_FACTOR: 18,
} as const;

/**
 * Parkes Error Grid Configuration
 */
export const PARKES = {
  DEFAULT_TYPE: 1 as const,

  DEFAULT_UNITS: 'mg/dl' as const,

  /** Axis extent in mg/dL that the zone boundaries are drawn to */
  AXIS_LIMIT: 550,

  /** Headroom in mg/dL kept above the largest reading */
  AXIS_MARGIN: 20,
} as const;

/**
 * Minimum pair counts per analysis
 */
export const MIN_PAIRS = {
  BLAND_ALTMAN: 2,
  PASSING_BABLOK: 2,
  DEMING: 3,
  LINEAR: 3,
  MOUNTAIN: 1,
  CLARKE: 1,
  PARKES: 1,
} as const;

/**
 * Logging Configuration
 */
export const LOGGING = {
  /** Environment variable consulted for the default log level */
  LEVEL_ENV: 'METHOD_AGREEMENT_LOG_LEVEL',

  DEFAULT_LEVEL: 'info' as const,
} as const;

const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

/**
 * Log level from the environment, falling back to the default
 */
export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const raw = env[LOGGING.LEVEL_ENV]?.trim().toLowerCase();
  const match = LOG_LEVELS.find((level) => level === raw);
  return match ?? LOGGING.DEFAULT_LEVEL;
}

/**
 * Built-in configuration, in the same shape an analysis profile uses
 */
export const DEFAULT_ANALYSIS_CONFIG: AnalysisConfig = {
  bland_altman: {
    mode: BLAND_ALTMAN.DEFAULT_MODE,
    z_multiplier: BLAND_ALTMAN.DEFAULT_Z_MULTIPLIER,
    confidence_level: BLAND_ALTMAN.DEFAULT_CONFIDENCE_LEVEL,
  },
  passing_bablok: {
    confidence_level: PASSING_BABLOK.DEFAULT_CONFIDENCE_LEVEL,
  },
  deming: {
    confidence_level: DEMING.DEFAULT_CONFIDENCE_LEVEL,
    variance_ratio: DEMING.DEFAULT_VARIANCE_RATIO,
    bootstrap: DEMING.DEFAULT_BOOTSTRAP,
    seed: DEMING.DEFAULT_SEED,
  },
  linear: {
    confidence_level: LINEAR.DEFAULT_CONFIDENCE_LEVEL,
  },
  mountain: {
    percentiles: MOUNTAIN.DEFAULT_PERCENTILES,
    central_range: MOUNTAIN.DEFAULT_CENTRAL_RANGE,
  },
  clarke: {
    units: CLARKE.DEFAULT_UNITS,
  },
  parkes: {
    type: PARKES.DEFAULT_TYPE,
    units: PARKES.DEFAULT_UNITS,
  },
  logging: {
    level: LOGGING.DEFAULT_LEVEL,
  },
};

/**
 * Merge a profile over the defaults, section by section
 */
export function mergeConfig(override?: AnalysisProfile, base: AnalysisConfig = DEFAULT_ANALYSIS_CONFIG): AnalysisConfig {
  return {
    bland_altman: { ...base.bland_altman, ...override?.bland_altman },
    passing_bablok: { ...base.passing_bablok, ...override?.passing_bablok },
    deming: { ...base.deming, ...override?.deming },
    linear: { ...base.linear, ...override?.linear },
    mountain: { ...base.mountain, ...override?.mountain },
    clarke: { ...base.clarke, ...override?.clarke },
    parkes: { ...base.parkes, ...override?.parkes },
    logging: { ...base.logging, ...override?.logging },
  };
}
