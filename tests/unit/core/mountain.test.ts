/**
 * Unit tests for mountain plot statistics
 */

import { describe, it, expect } from 'vitest';
import { mountain } from '@/core/mountain.js';

describe('mountain', () => {
  // Differences (method 2 - method 1) are 3, 1, 5, 2, 4
  const method1 = [0, 0, 0, 0, 0];
  const method2 = [3, 1, 5, 2, 4];

  it('should evaluate the folded CDF at evenly spaced probabilities', () => {
    const result = mountain(method1, method2, { percentiles: 5, centralRange: 50 });
    if (!result.ok) throw result.val;
    expect(result.val.probabilities).toEqual([0, 0.25, 0.5, 0.75, 1]);
    expect(result.val.quantiles).toEqual([1, 2, 3, 4, 5]);
    expect(result.val.mountain).toEqual([0, 25, 50, 25, 0]);
  });

  it('should integrate the folded curve with the trapezoid rule', () => {
    const result = mountain(method1, method2, { percentiles: 5, centralRange: 50 });
    if (!result.ok) throw result.val;
    // 12.5 + 37.5 + 37.5 + 12.5
    expect(result.val.auc).toBe(100);
  });

  it('should locate the median and central range', () => {
    const result = mountain(method1, method2, { percentiles: 5, centralRange: 50 });
    if (!result.ok) throw result.val;
    expect(result.val.medianIndex).toBe(2);
    expect(result.val.median).toBe(3);
    expect(result.val.rangeBounds).toEqual({ lower: 2, upper: 4 });
    expect(result.val.rangeIndex).toEqual([1, 3]);
  });

  it('should use 100 percentiles and a 68.27% central range by default', () => {
    const result = mountain(method1, method2);
    if (!result.ok) throw result.val;
    expect(result.val.probabilities).toHaveLength(100);
    expect(result.val.probabilities[99]).toBe(1);
    expect(result.val.medianIndex).toBe(50);
    expect(result.val.centralRange).toBe(68.27);
    expect(result.val.mountain[0]).toBe(0);
    expect(result.val.mountain[99]).toBe(0);
  });

  it('should be symmetric for symmetric differences', () => {
    const result = mountain([0, 0, 0, 0], [-2, -1, 1, 2], { percentiles: 9 });
    if (!result.ok) throw result.val;
    const { quantiles, mountain: folded } = result.val;
    for (let i = 0; i < quantiles.length; i++) {
      expect(quantiles[i]).toBeCloseTo(-quantiles[quantiles.length - 1 - i], 12);
      expect(folded[i]).toBeCloseTo(folded[folded.length - 1 - i], 12);
    }
  });

  it('should give zero area when the methods agree exactly', () => {
    const result = mountain([1, 2, 3], [1, 2, 3]);
    if (!result.ok) throw result.val;
    expect(result.val.auc).toBe(0);
    expect(result.val.median).toBe(0);
  });

  it('should reject a central range above 100', () => {
    const result = mountain(method1, method2, { centralRange: 120 });
    if (result.ok) throw new Error('expected failure');
    expect(result.val.code).toBe('InvalidParams');
    expect(result.val.message).toBe("Validation error on field 'centralRange': Percentage cannot exceed 100");
  });

  it('should reject fewer than two percentiles', () => {
    const result = mountain(method1, method2, { percentiles: 1 });
    if (result.ok) throw new Error('expected failure');
    expect(result.val.code).toBe('InvalidParams');
    expect(result.val.message).toBe("Validation error on field 'percentiles': must be >= 2");
  });

  it('should accept two percentiles', () => {
    const result = mountain(method1, method2, { percentiles: 2 });
    if (!result.ok) throw result.val;
    expect(result.val.probabilities).toEqual([0, 1]);
    expect(result.val.quantiles).toEqual([1, 5]);
  });

  it('should fail with ShapeMismatch for unequal lengths', () => {
    const result = mountain([1, 2], [1]);
    if (result.ok) throw new Error('expected failure');
    expect(result.val.code).toBe('ShapeMismatch');
  });
});
