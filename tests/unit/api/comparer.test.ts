import { describe, it, expect, beforeEach } from 'vitest';
import { pino } from 'pino';
import { MethodComparer, createComparer } from '@/api/comparer.js';
import type { AnalysisCompletedEvent, AnalysisFailedEvent } from '@/api/events.js';
import { ComparisonError } from '@/api/errors.js';

const METHOD_1 = [1, 2, 3, 4, 5];
const METHOD_2 = [1.1, 2.0, 3.2, 3.9, 5.3];

describe('MethodComparer', () => {
  let comparer: MethodComparer;
  let completed: AnalysisCompletedEvent[];
  let failed: AnalysisFailedEvent[];

  beforeEach(() => {
    comparer = createComparer({ env: {} }, { logger: pino({ level: 'silent' }) });
    completed = [];
    failed = [];
    comparer.on('analysis:completed', (event) => completed.push(event));
    comparer.on('analysis:failed', (event) => failed.push(event));
  });

  it('should emit analysis:completed with the result', () => {
    const result = comparer.blandAltman(METHOD_1, METHOD_2);
    if (!result.ok) throw result.val;
    expect(completed).toHaveLength(1);
    expect(completed[0].kind).toBe('bland-altman');
    expect(completed[0].result).toBe(result.val);
    expect(completed[0].durationMs).toBeGreaterThanOrEqual(0);
    expect(failed).toHaveLength(0);
  });

  it('should emit analysis:failed with the error', () => {
    const result = comparer.passingBablok([1, 2, 3], [1, 2]);
    expect(result.err).toBe(true);
    expect(failed).toHaveLength(1);
    expect(failed[0].kind).toBe('passing-bablok');
    expect(failed[0].error).toBeInstanceOf(ComparisonError);
    expect(failed[0].error.code).toBe('ShapeMismatch');
    expect(completed).toHaveLength(0);
  });

  it('should run every analysis', () => {
    expect(comparer.passingBablok(METHOD_1, METHOD_2).ok).toBe(true);
    expect(comparer.deming(METHOD_1, METHOD_2, { bootstrap: 50 }).ok).toBe(true);
    expect(comparer.linear(METHOD_1, METHOD_2).ok).toBe(true);
    expect(comparer.mountain(METHOD_1, METHOD_2).ok).toBe(true);
    expect(comparer.clarke([100, 150], [105, 140]).ok).toBe(true);
    expect(comparer.parkes([100, 150], [105, 140]).ok).toBe(true);
    expect(completed.map((event) => event.kind)).toEqual([
      'passing-bablok',
      'deming',
      'linear',
      'mountain',
      'clarke',
      'parkes',
    ]);
  });

  it('should expose the effective configuration', () => {
    expect(comparer.getConfig().bland_altman.mode).toBe('absolute');
  });
});

describe('createComparer with a profile', () => {
  const profile = [
    'bland_altman:',
    '  mode: relative',
    '  confidence_level: null',
    'deming:',
    '  bootstrap: null',
    'mountain:',
    '  percentiles: 11',
    'clarke:',
    '  units: mmol',
    'parkes:',
    '  type: 2',
  ].join('\n');

  it('should apply profile defaults to each analysis', () => {
    const comparer = createComparer({ profile, env: {} }, { logger: pino({ level: 'silent' }) });

    const agreement = comparer.blandAltman([10, 20, 40], [12, 18, 44]);
    if (!agreement.ok) throw agreement.val;
    expect(agreement.val.mode).toBe('relative');
    expect(agreement.val.confidenceIntervals).toBeNull();

    const fit = comparer.deming(METHOD_1, METHOD_2);
    if (!fit.ok) throw fit.val;
    expect(fit.val.bootstrapSamples).toBe(0);

    const folded = comparer.mountain(METHOD_1, METHOD_2);
    if (!folded.ok) throw folded.val;
    expect(folded.val.probabilities).toHaveLength(11);

    const zones = comparer.clarke([5], [5.5]);
    if (!zones.ok) throw zones.val;
    expect(zones.val.units).toBe('mmol');

    const grid = comparer.parkes([20], [85]);
    if (!grid.ok) throw grid.val;
    expect(grid.val.type).toBe(2);
    expect(grid.val.zones).toEqual(['D']);
  });

  it('should let per-call options override the profile', () => {
    const comparer = createComparer({ profile, env: {} }, { logger: pino({ level: 'silent' }) });
    const result = comparer.blandAltman(METHOD_1, METHOD_2, { mode: 'absolute', confidenceLevel: 0.9 });
    if (!result.ok) throw result.val;
    expect(result.val.mode).toBe('absolute');
    expect(result.val.confidenceLevel).toBe(0.9);
  });

  it('should keep profile values for per-call options left undefined', () => {
    const comparer = createComparer({ profile, env: {} }, { logger: pino({ level: 'silent' }) });

    const folded = comparer.mountain(METHOD_1, METHOD_2, { percentiles: undefined });
    if (!folded.ok) throw folded.val;
    expect(folded.val.probabilities).toHaveLength(11);

    const agreement = comparer.blandAltman(METHOD_1, METHOD_2, { mode: undefined, confidenceLevel: undefined });
    if (!agreement.ok) throw agreement.val;
    expect(agreement.val.mode).toBe('relative');
    expect(agreement.val.confidenceIntervals).toBeNull();
  });

  it('should throw for an invalid profile', () => {
    expect(() => createComparer({ profile: 'deming:\n  variance_ratio: -1\n', env: {} })).toThrow(ComparisonError);
  });

  it('should build its own logger at the configured level', () => {
    const comparer = new MethodComparer({ profile: 'logging:\n  level: silent\n', env: {} });
    expect(comparer.getConfig().logging.level).toBe('silent');
    expect(comparer.linear(METHOD_1, METHOD_2).ok).toBe(true);
  });
});
