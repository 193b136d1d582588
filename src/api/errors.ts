/**
 * Comparison error utilities.
 *
 * Provides a consistent error type for all public API surfaces and
 * helpers to convert foreign errors (zod issues, plain Errors) into
 * ComparisonError instances that callers can reason about.
 */

import type { ZodError } from 'zod';

/**
 * Error codes surfaced to API consumers.
 *
 * The first five map one-to-one onto the preconditions an analysis can
 * violate; `InvalidParams` covers option objects rejected by their schema.
 */
export type ComparisonErrorCode =
  | 'ShapeMismatch'
  | 'InvalidValue'
  | 'InsufficientData'
  | 'DivisionByZero'
  | 'DegenerateRegression'
  | 'InvalidParams';

/**
 * Plain serialisable shape of a comparison error.
 */
export interface ComparisonErrorShape {
  code: ComparisonErrorCode;
  message: string;
  details?: Record<string, unknown>;
}

/**
 * Error implementation returned by every analysis.
 *
 * Implements `ComparisonErrorShape` so it can be consumed as a plain object
 * or as an Error instance.
 */
export class ComparisonError extends Error implements ComparisonErrorShape {
  public readonly code: ComparisonErrorCode;
  public readonly details?: Record<string, unknown>;

  constructor(
    code: ComparisonErrorCode,
    message: string,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ComparisonError';
    this.code = code;
    this.details = details;
  }

  /**
   * Index of the measurement pair that triggered the error, when known.
   */
  public get index(): number | undefined {
    const index = this.details?.index;
    return typeof index === 'number' ? index : undefined;
  }

  /**
   * Serialize error into plain shape (for JSON responses/logging).
   */
  public toObject(): ComparisonErrorShape {
    return {
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * Map unknown errors into ComparisonError instances.
 *
 * @param error - Error thrown while computing an analysis
 * @param fallbackCode - Code to use when we cannot infer a specific one
 */
export function toComparisonError(
  error: unknown,
  fallbackCode: ComparisonErrorCode = 'InvalidParams'
): ComparisonError {
  if (error instanceof ComparisonError) {
    return error;
  }

  if (error instanceof Error) {
    return new ComparisonError(fallbackCode, error.message, { cause: error.name });
  }

  return new ComparisonError(fallbackCode, 'Unknown comparison error');
}

export function shapeMismatch(method1Length: number, method2Length: number): ComparisonError {
  return new ComparisonError(
    'ShapeMismatch',
    `Length of method 1 (${method1Length}) and method 2 (${method2Length}) are not equal`,
    { method1Length, method2Length }
  );
}

export function insufficientData(actual: number, required: number, analysis?: string): ComparisonError {
  const scope = analysis ? ` for ${analysis}` : '';
  return new ComparisonError(
    'InsufficientData',
    `At least ${required} measurement pairs are required${scope}, got ${actual}`,
    { actual, required, ...(analysis ? { analysis } : {}) }
  );
}

/**
 * Convert Zod validation error to ComparisonError
 *
 * Extracts the first issue and names the offending option field, keeping
 * the full issue list in `details.issues`.
 *
 * @example
 * ```typescript
 * const result = BlandAltmanOptionsSchema.safeParse({ confidenceLevel: 2 });
 * if (!result.success) {
 *   throw zodErrorToComparisonError(result.error);
 * }
 * // Throws: "Validation error on field 'confidenceLevel': Confidence level must be below 1"
 * ```
 */
export function zodErrorToComparisonError(error: ZodError): ComparisonError {
  const firstIssue = error.issues[0];
  const field = firstIssue && firstIssue.path.length > 0 ? firstIssue.path.join('.') : 'root';
  const message = `Validation error on field '${field}': ${firstIssue?.message ?? 'Invalid value'}`;

  return new ComparisonError('InvalidParams', message, {
    field,
    issues: error.issues.map((issue) => ({
      path: issue.path,
      message: issue.message,
      code: issue.code,
    })),
  });
}
