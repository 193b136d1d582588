/**
 * Result Type Helpers
 *
 * ReScript-inspired Result types for explicit error handling.
 * Every public analysis returns `Result<T, ComparisonError>`: either a
 * complete result or the precondition that failed, never a partial value.
 *
 * Usage:
 * ```typescript
 * const result = blandAltman(method1, method2);
 * if (result.err) {
 *   console.error(result.val.code);
 * } else {
 *   const { bias } = result.val; // Type-safe access
 * }
 * ```
 */

import { Result, Ok, Err } from 'ts-results';
import { ComparisonError, toComparisonError } from '../api/errors.js';

/**
 * Run a throwing computation and capture its outcome as a Result.
 *
 * Any ComparisonError is passed through untouched; other errors are
 * normalised with `toComparisonError`.
 *
 * @example
 * ```typescript
 * const result = resultifySync(() => computeBlandAltman(series, options));
 * ```
 */
export function resultifySync<T>(fn: () => T): Result<T, ComparisonError> {
  try {
    return Ok(fn());
  } catch (error) {
    return Err(toComparisonError(error));
  }
}

/**
 * Helper to unwrap Result or throw
 *
 * Use when you want to convert Result back to exception-based flow.
 *
 * @example
 * ```typescript
 * const fit = unwrap(passingBablok(method1, method2)); // Throws if Err
 * ```
 */
export function unwrap<T, E extends Error>(result: Result<T, E>): T {
  if (result.ok) {
    return result.val;
  }
  throw result.val;
}

/**
 * Helper to get value or default
 */
export function getOrDefault<T, E extends Error>(result: Result<T, E>, defaultValue: T): T {
  return result.ok ? result.val : defaultValue;
}

/**
 * Helper to map Result value
 *
 * @example
 * ```typescript
 * const slope = mapResult(passingBablok(method1, method2), (fit) => fit.slope);
 * ```
 */
export function mapResult<T, U, E extends Error>(
  result: Result<T, E>,
  fn: (value: T) => U
): Result<U, E> {
  return result.ok ? Ok(fn(result.val)) : result;
}

/**
 * Helper to chain Result operations
 */
export function chainResult<T, U, E extends Error>(
  result: Result<T, E>,
  fn: (value: T) => Result<U, E>
): Result<U, E> {
  return result.ok ? fn(result.val) : result;
}

// Re-export Result types for convenience
export { Result, Ok, Err };
