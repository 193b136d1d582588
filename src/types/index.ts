/**
 * Main type exports for method-agreement
 */

export * from './comparison.js';
