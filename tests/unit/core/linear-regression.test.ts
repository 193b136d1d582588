/**
 * Unit tests for least-squares regression
 */

import { describe, it, expect } from 'vitest';
import { linearRegression } from '@/core/linear-regression.js';

describe('linearRegression', () => {
  it('should fit noisy data with t-based intervals on n - 2 degrees of freedom', () => {
    const result = linearRegression([1, 2, 3, 4, 5], [1.1, 2.0, 3.2, 3.9, 5.3]);
    if (!result.ok) throw result.val;
    const fit = result.val;
    expect(fit.slope).toBeCloseTo(1.03, 12);
    expect(fit.intercept).toBeCloseTo(0.01, 12);
    expect(fit.residualStandardError).toBeCloseTo(0.174164673035, 10);
    expect(fit.slopeStandardError).toBeCloseTo(0.055075705473, 10);
    expect(fit.interceptStandardError).toBeCloseTo(0.182665450118, 10);
    expect(fit.rSquared).toBeCloseTo(0.991495327103, 10);
    expect(fit.slopeCI.lower).toBeCloseTo(0.854724524607, 8);
    expect(fit.slopeCI.upper).toBeCloseTo(1.205275475393, 8);
    expect(fit.interceptCI.lower).toBeCloseTo(-0.57132298683, 8);
    expect(fit.interceptCI.upper).toBeCloseTo(0.59132298683, 8);
  });

  it('should recover an exact line with zero-width intervals', () => {
    const result = linearRegression([0, 1, 2, 3], [3, 5, 7, 9]);
    if (!result.ok) throw result.val;
    expect(result.val.slope).toBe(2);
    expect(result.val.intercept).toBe(3);
    expect(result.val.rSquared).toBe(1);
    expect(result.val.slopeCI.upper - result.val.slopeCI.lower).toBe(0);
    expect(result.val.interceptCI.upper - result.val.interceptCI.lower).toBe(0);
  });

  it('should treat a constant method 2 as a perfect fit', () => {
    const result = linearRegression([1, 2, 3], [4, 4, 4]);
    if (!result.ok) throw result.val;
    expect(result.val.slope).toBe(0);
    expect(result.val.intercept).toBe(4);
    expect(result.val.rSquared).toBe(1);
  });

  it('should fail with DegenerateRegression when method 1 is constant', () => {
    const result = linearRegression([2, 2, 2], [1, 2, 3]);
    if (result.ok) throw new Error('expected failure');
    expect(result.val.code).toBe('DegenerateRegression');
  });

  it('should require three pairs', () => {
    const result = linearRegression([1, 2], [1, 2]);
    if (result.ok) throw new Error('expected failure');
    expect(result.val.code).toBe('InsufficientData');
  });
});
