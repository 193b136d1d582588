/**
 * Zod schema exports for method-agreement option validation
 *
 * These schemas provide runtime validation for every analysis entry point
 * and for analysis profiles.
 *
 * @example
 * ```typescript
 * import { BlandAltmanOptionsSchema } from 'method-agreement';
 *
 * const result = BlandAltmanOptionsSchema.safeParse({ mode: 'relative' });
 * if (!result.success) {
 *   console.error(result.error.issues);
 * }
 * ```
 */

// Common primitives
export * from './common.js';

// Analysis option schemas
export * from './options.js';

// Analysis profile schemas
export * from './config.js';
