/**
 * Clarke error grid zone classification for glucose readings.
 *
 * Zones grade the clinical consequence of a test reading against the
 * reference:
 * - A: within 20% of the reference, or both hypoglycaemic
 * - B: benign deviation
 * - C: overcorrection
 * - D: failure to detect
 * - E: erroneous treatment
 */

import type { Logger } from 'pino';
import type {
  ClarkeOptions,
  ClarkeResult,
  ClarkeZone,
  GlucoseUnits,
  MeasurementSeries,
  MeasurementValues,
} from '../types/index.js';
import { ClarkeOptionsSchema } from '../types/schemas/index.js';
import { CLARKE, MIN_PAIRS } from '../config/defaults.js';
import type { ComparisonError } from '../api/errors.js';
import { assertValidMeasurements, parseOptions } from '../api/validators.js';
import { lazyLog } from '../utils/logger-helpers.js';
import { resultifySync, type Result } from '../utils/result-helpers.js';

const ZONES: readonly ClarkeZone[] = ['A', 'B', 'C', 'D', 'E'];

/**
 * Zone of a single reading pair
 *
 * Thresholds are in mg/dL and scaled down for mmol/L. Later zones take
 * precedence: a pair matching both C and A is graded A.
 */
export function clarkeZone(reference: number, test: number, units: GlucoseUnits = CLARKE.DEFAULT_UNITS): ClarkeZone {
  const f = units === 'mmol' ? CLARKE.MMOL_FACTOR : 1;
  let zone: ClarkeZone = 'B';

  if ((reference <= 70 / f && test >= 180 / f) || (reference >= 180 / f && test <= 70 / f)) {
    zone = 'E';
  }

  const testInDetectionBand = test >= 70 / f && test < 180 / f;
  if (testInDetectionBand && (reference < 70 / f || reference > 240 / f)) {
    zone = 'D';
  }

  if (
    (reference >= 130 / f && reference <= 180 / f && test < (7 / 5) * (reference - 130 / f)) ||
    (reference > 70 / f && test > 180 / f && test > reference + 110 / f)
  ) {
    zone = 'C';
  }

  const relativeError = (Math.abs(test - reference) / reference) * 100;
  if (relativeError <= 20 || (reference < 70 / f && test < 70 / f)) {
    zone = 'A';
  }

  return zone;
}

function emptyTally(): Record<ClarkeZone, number> {
  return { A: 0, B: 0, C: 0, D: 0, E: 0 };
}

/**
 * Classify every pair of a validated series (x = reference, y = test)
 */
export function computeClarkeZones(
  series: MeasurementSeries,
  options: ClarkeOptions = {},
  logger?: Logger
): ClarkeResult {
  const units = options.units ?? CLARKE.DEFAULT_UNITS;
  const n = series.length;

  const zones = series.map(({ x, y }) => clarkeZone(x, y, units));
  const counts = emptyTally();
  for (const zone of zones) {
    counts[zone]++;
  }

  const percentages = emptyTally();
  for (const zone of ZONES) {
    percentages[zone] = (counts[zone] / n) * 100;
  }

  lazyLog(logger, 'debug', () => ({ analysis: 'clarke', n, units, ...counts }), 'Clarke zones assigned');

  return Object.freeze({
    n,
    units,
    zones: Object.freeze(zones),
    counts: Object.freeze(counts),
    percentages: Object.freeze(percentages),
  });
}

/**
 * Clarke error grid zones for reference and test glucose readings.
 *
 * @example
 * ```typescript
 * const result = clarkeZones([100, 60], [110, 200]);
 * // result.val.zones => ['A', 'E']
 * ```
 */
export function clarkeZones(
  reference: MeasurementValues,
  test: MeasurementValues,
  options?: ClarkeOptions,
  logger?: Logger
): Result<ClarkeResult, ComparisonError> {
  return resultifySync(() => {
    const series = assertValidMeasurements(reference, test, {
      minPairs: MIN_PAIRS.CLARKE,
      analysis: 'Clarke error grid',
    });
    const parsed = parseOptions(ClarkeOptionsSchema, options);
    return computeClarkeZones(series, parsed, logger);
  });
}
