/**
 * Common Zod schema primitives for method-agreement
 */

import { z } from 'zod';

/**
 * Confidence level, strictly inside (0, 1)
 */
export const ConfidenceLevel = z
  .number({ invalid_type_error: 'Confidence level must be a number' })
  .gt(0, 'Confidence level must be above 0')
  .lt(1, 'Confidence level must be below 1');

/**
 * Positive, finite number
 */
export const PositiveFiniteNumber = z
  .number()
  .finite('Must be finite')
  .positive('Must be positive');

/**
 * Positive integer validator
 */
export const PositiveInteger = z
  .number()
  .int('Must be an integer')
  .positive('Must be a positive integer');

/**
 * Percentage in [0, 100]
 */
export const Percentage = z
  .number()
  .min(0, 'Percentage must be at least 0')
  .max(100, 'Percentage cannot exceed 100');

/**
 * Bland-Altman difference mode enum
 */
export const DifferenceModeSchema = z.enum(['absolute', 'relative'], {
  errorMap: () => ({ message: 'Difference mode must be either absolute or relative' }),
});

/**
 * Glucose units enum
 */
export const GlucoseUnitsSchema = z.enum(['mg/dl', 'mmol'], {
  errorMap: () => ({ message: 'Units must be either mg/dl or mmol' }),
});

/**
 * Parkes grid variant
 */
export const DiabetesTypeSchema = z.union([z.literal(1), z.literal(2)], {
  errorMap: () => ({ message: 'Diabetes type must be 1 or 2' }),
});
