/**
 * Confidence interval helpers shared by every analyzer.
 *
 * Pure functions: critical values for two-sided intervals and the clamped
 * position lookup the Passing-Bablok interval uses.
 */

import type { Interval } from '../types/index.js';
import { normalQuantile, studentTQuantile } from '../utils/distributions.js';
import { clamp } from '../api/validators.js';

function assertConfidenceLevel(confidenceLevel: number): void {
  if (!(confidenceLevel > 0 && confidenceLevel < 1)) {
    throw new RangeError(`Confidence level must be between 0 and 1, got ${confidenceLevel}`);
  }
}

/**
 * Two-sided standard normal critical value z_{1-α/2}
 *
 * @example
 * ```typescript
 * normalCritical(0.95) // => 1.959963985
 * ```
 */
export function normalCritical(confidenceLevel: number): number {
  assertConfidenceLevel(confidenceLevel);
  return normalQuantile(1 - (1 - confidenceLevel) / 2);
}

/**
 * Two-sided Student-t critical value t_{1-α/2, df}
 *
 * @example
 * ```typescript
 * studentTCritical(0.95, 4) // => 2.776445105
 * ```
 */
export function studentTCritical(confidenceLevel: number, degreesOfFreedom: number): number {
  assertConfidenceLevel(confidenceLevel);
  return studentTQuantile(1 - (1 - confidenceLevel) / 2, degreesOfFreedom);
}

export function symmetricInterval(center: number, halfWidth: number): Interval {
  return Object.freeze({ lower: center - halfWidth, upper: center + halfWidth });
}

/**
 * Interval from two bounds given in either order
 */
export function orderedInterval(a: number, b: number): Interval {
  return Object.freeze({ lower: Math.min(a, b), upper: Math.max(a, b) });
}

/**
 * Value at a 0-based position of an ascending sequence.
 *
 * Positions are rounded, and those outside `[0, length - 1]` clamp to the
 * nearest end, so interval lookups on small samples return the extreme value
 * instead of failing.
 *
 * @throws {RangeError} for an empty sequence
 */
export function valueAtPosition(sorted: ArrayLike<number>, position: number): number {
  if (sorted.length === 0) {
    throw new RangeError('Cannot look up a position in an empty sequence');
  }
  return sorted[clamp(Math.round(position), 0, sorted.length - 1)];
}
