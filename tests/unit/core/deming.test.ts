/**
 * Unit tests for Deming regression
 */

import { describe, it, expect } from 'vitest';
import { deming, fitDeming } from '@/core/deming.js';
import { assertValidMeasurements } from '@/api/validators.js';

const METHOD_1 = [1, 2, 3, 4, 5];
const METHOD_2 = [1.1, 2.0, 3.2, 3.9, 5.3];

const NOISY_1 = [1, 2, 3, 4, 5, 6, 7, 8];
const NOISY_2 = [1.3, 1.8, 3.3, 3.9, 5.4, 5.8, 7.4, 7.7];

describe('fitDeming', () => {
  it('should compute the closed-form fit with equal error variances', () => {
    const fit = fitDeming(assertValidMeasurements(METHOD_1, METHOD_2), 1);
    expect(fit).not.toBeNull();
    if (!fit) return;
    expect(fit.slope).toBeCloseTo(1.034557755954, 10);
    expect(fit.intercept).toBeCloseTo(-0.003673267862, 10);
    expect(fit.sigmaX).toBeCloseTo(0.085688499494, 10);
    expect(fit.sigmaY).toBeCloseTo(0.085688499494, 10);
  });

  it('should scale the y error by the variance ratio', () => {
    const fit = fitDeming(assertValidMeasurements(METHOD_1, METHOD_2), 2);
    if (!fit) throw new Error('expected a fit');
    expect(fit.slope).toBeCloseTo(1.033068125109, 10);
    expect(fit.intercept).toBeCloseTo(0.000795624674, 10);
    expect(fit.sigmaX).toBeCloseTo(0.070355236349, 10);
    expect(fit.sigmaY).toBeCloseTo(0.099497329429, 10);
  });

  it('should return null when the methods do not co-vary', () => {
    expect(fitDeming(assertValidMeasurements([1, 2, 3], [5, 5, 5]), 1)).toBeNull();
  });
});

describe('deming', () => {
  it('should report point estimates only when bootstrap is disabled', () => {
    const result = deming(METHOD_1, METHOD_2, { bootstrap: null });
    if (!result.ok) throw result.val;
    expect(result.val.slope.estimate).toBeCloseTo(1.034557755954, 10);
    expect(result.val.slope.ci).toBeNull();
    expect(result.val.slope.standardError).toBeNull();
    expect(result.val.slope.bootstrapMedian).toBeNull();
    expect(result.val.bootstrapSamples).toBe(0);
    expect(result.val.varianceRatio).toBe(1);
  });

  it('should give slope 1 and intercept 0 for identical methods', () => {
    const result = deming([1, 2, 3, 4], [1, 2, 3, 4], { bootstrap: null });
    if (!result.ok) throw result.val;
    expect(result.val.slope.estimate).toBe(1);
    expect(result.val.intercept.estimate).toBe(0);
    expect(result.val.sigmaX.estimate).toBe(0);
  });

  it('should reproduce bootstrap intervals for a fixed seed', () => {
    const first = deming(NOISY_1, NOISY_2, { bootstrap: 200, seed: 'test-seed' });
    const second = deming(NOISY_1, NOISY_2, { bootstrap: 200, seed: 'test-seed' });
    if (!first.ok) throw first.val;
    if (!second.ok) throw second.val;
    expect(first.val).toEqual(second.val);
  });

  it('should produce different resamples for different seeds', () => {
    const first = deming(NOISY_1, NOISY_2, { bootstrap: 200, seed: 'seed-a' });
    const second = deming(NOISY_1, NOISY_2, { bootstrap: 200, seed: 'seed-b' });
    if (!first.ok) throw first.val;
    if (!second.ok) throw second.val;
    expect(first.val.slope.ci).not.toEqual(second.val.slope.ci);
    expect(first.val.slope.estimate).toBe(second.val.slope.estimate);
  });

  it('should bracket the full-sample slope with its bootstrap interval', () => {
    const result = deming(NOISY_1, NOISY_2, { bootstrap: 500 });
    if (!result.ok) throw result.val;
    const { slope } = result.val;
    expect(slope.estimate).toBeCloseTo(0.981050971189, 10);
    expect(slope.ci).not.toBeNull();
    if (!slope.ci || slope.standardError === null) return;
    expect(slope.ci.lower).toBeLessThan(slope.estimate);
    expect(slope.ci.upper).toBeGreaterThan(slope.estimate);
    expect(slope.standardError).toBeGreaterThan(0);
    expect(result.val.bootstrapSamples).toBeLessThanOrEqual(500);
    expect(result.val.bootstrapSamples).toBeGreaterThan(450);
  });

  it('should give zero-width intervals for identical methods', () => {
    const result = deming([1, 2, 3, 4, 5], [1, 2, 3, 4, 5], { bootstrap: 100 });
    if (!result.ok) throw result.val;
    expect(result.val.slope.ci?.lower).toBeCloseTo(1, 12);
    expect(result.val.slope.ci?.upper).toBeCloseTo(1, 12);
    expect(result.val.slope.standardError).toBeCloseTo(0, 12);
  });

  it('should fail with DegenerateRegression for a constant method', () => {
    const result = deming([1, 2, 3], [4, 4, 4], { bootstrap: null });
    if (result.ok) throw new Error('expected failure');
    expect(result.val.code).toBe('DegenerateRegression');
  });

  it('should require three pairs', () => {
    const result = deming([1, 2], [1, 2]);
    if (result.ok) throw new Error('expected failure');
    expect(result.val.code).toBe('InsufficientData');
    expect(result.val.message).toBe('At least 3 measurement pairs are required for Deming regression, got 2');
  });

  it('should reject a non-positive variance ratio', () => {
    const result = deming(METHOD_1, METHOD_2, { varianceRatio: 0 });
    if (result.ok) throw new Error('expected failure');
    expect(result.val.code).toBe('InvalidParams');
    expect(result.val.details?.field).toBe('varianceRatio');
  });

  it('should reject a fractional bootstrap count', () => {
    const result = deming(METHOD_1, METHOD_2, { bootstrap: 2.5 });
    if (result.ok) throw new Error('expected failure');
    expect(result.val.message).toBe("Validation error on field 'bootstrap': Must be an integer");
  });
});
