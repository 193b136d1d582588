/**
 * Analysis Profile Schemas
 *
 * Zod schemas for validating an analysis profile (YAML) before it is merged
 * over the built-in defaults. Keys are snake_case as written in the profile.
 *
 * @module schemas/config
 */

import { z } from 'zod';
import {
  ConfidenceLevel,
  DiabetesTypeSchema,
  DifferenceModeSchema,
  GlucoseUnitsSchema,
  Percentage,
  PositiveFiniteNumber,
  PositiveInteger,
} from './common.js';

/**
 * Bland-Altman section
 */
export const BlandAltmanConfigSchema = z.object({
  mode: DifferenceModeSchema,
  z_multiplier: PositiveFiniteNumber,
  confidence_level: ConfidenceLevel.nullable(),
});

/**
 * Passing-Bablok section
 */
export const PassingBablokConfigSchema = z.object({
  confidence_level: ConfidenceLevel,
});

/**
 * Deming section
 */
export const DemingConfigSchema = z.object({
  confidence_level: ConfidenceLevel,
  variance_ratio: PositiveFiniteNumber,
  bootstrap: PositiveInteger.nullable(),
  seed: z.string().min(1, 'Seed cannot be empty'),
});

/**
 * Linear regression section
 */
export const LinearConfigSchema = z.object({
  confidence_level: ConfidenceLevel,
});

/**
 * Mountain section
 */
export const MountainConfigSchema = z.object({
  percentiles: PositiveInteger.min(2, 'must be >= 2'),
  central_range: Percentage,
});

/**
 * Clarke error grid section
 */
export const ClarkeConfigSchema = z.object({
  units: GlucoseUnitsSchema,
});

/**
 * Parkes error grid section
 */
export const ParkesConfigSchema = z.object({
  type: DiabetesTypeSchema,
  units: GlucoseUnitsSchema,
});

/**
 * Logging section
 */
export const LoggingConfigSchema = z.object({
  level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'], {
    errorMap: () => ({ message: 'Log level must be one of: trace, debug, info, warn, error, fatal, silent' }),
  }),
});

/**
 * Complete analysis configuration
 */
export const AnalysisConfigSchema = z.object({
  bland_altman: BlandAltmanConfigSchema,
  passing_bablok: PassingBablokConfigSchema,
  deming: DemingConfigSchema,
  linear: LinearConfigSchema,
  mountain: MountainConfigSchema,
  clarke: ClarkeConfigSchema,
  parkes: ParkesConfigSchema,
  logging: LoggingConfigSchema,
});

/**
 * A profile may set any subset of sections and keys.
 */
export const AnalysisProfileSchema = z
  .object({
    bland_altman: BlandAltmanConfigSchema.partial().strict(),
    passing_bablok: PassingBablokConfigSchema.partial().strict(),
    deming: DemingConfigSchema.partial().strict(),
    linear: LinearConfigSchema.partial().strict(),
    mountain: MountainConfigSchema.partial().strict(),
    clarke: ClarkeConfigSchema.partial().strict(),
    parkes: ParkesConfigSchema.partial().strict(),
    logging: LoggingConfigSchema.partial().strict(),
  })
  .partial()
  .strict();

export type AnalysisConfig = z.infer<typeof AnalysisConfigSchema>;
export type AnalysisProfile = z.infer<typeof AnalysisProfileSchema>;
export type LogLevel = AnalysisConfig['logging']['level'];
