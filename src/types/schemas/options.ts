/**
 * Analysis option schemas
 *
 * Each schema mirrors the matching options interface in
 * src/types/comparison.ts. Unknown keys are rejected so a misspelt option
 * never silently falls back to its default.
 */

import { z } from 'zod';
import {
  ConfidenceLevel,
  DifferenceModeSchema,
  DiabetesTypeSchema,
  GlucoseUnitsSchema,
  Percentage,
  PositiveFiniteNumber,
  PositiveInteger,
} from './common.js';

/**
 * Mirrors: src/types/comparison.ts:BlandAltmanOptions
 */
export const BlandAltmanOptionsSchema = z
  .object({
    mode: DifferenceModeSchema.optional(),
    zMultiplier: PositiveFiniteNumber.optional(),
    confidenceLevel: ConfidenceLevel.nullable().optional(),
  })
  .strict();

/**
 * Mirrors: src/types/comparison.ts:PassingBablokOptions
 */
export const PassingBablokOptionsSchema = z
  .object({
    confidenceLevel: ConfidenceLevel.optional(),
  })
  .strict();

/**
 * Mirrors: src/types/comparison.ts:DemingOptions
 */
export const DemingOptionsSchema = z
  .object({
    confidenceLevel: ConfidenceLevel.optional(),
    varianceRatio: PositiveFiniteNumber.optional(),
    bootstrap: PositiveInteger.nullable().optional(),
    seed: z.string().optional(),
  })
  .strict();

/**
 * Mirrors: src/types/comparison.ts:LinearRegressionOptions
 */
export const LinearRegressionOptionsSchema = z
  .object({
    confidenceLevel: ConfidenceLevel.optional(),
  })
  .strict();

/**
 * Mirrors: src/types/comparison.ts:MountainOptions
 */
export const MountainOptionsSchema = z
  .object({
    percentiles: PositiveInteger.min(2, 'must be >= 2').optional(),
    centralRange: Percentage.optional(),
  })
  .strict();

/**
 * Mirrors: src/types/comparison.ts:ClarkeOptions
 */
export const ClarkeOptionsSchema = z
  .object({
    units: GlucoseUnitsSchema.optional(),
  })
  .strict();

/**
 * Mirrors: src/types/comparison.ts:ParkesOptions
 */
export const ParkesOptionsSchema = z
  .object({
    type: DiabetesTypeSchema.optional(),
    units: GlucoseUnitsSchema.optional(),
  })
  .strict();
