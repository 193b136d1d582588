/**
 * Parkes (consensus) error grid zone classification for glucose readings.
 *
 * The grid differs between type 1 and type 2 diabetes. Each zone boundary is
 * a polyline in mg/dL that ends in a ray running off to the edge of the plot,
 * so the regions are closed against axes sized to the data.
 */

import type { Logger } from 'pino';
import { booleanPointInPolygon } from '@turf/boolean-point-in-polygon';
import { polygon } from '@turf/helpers';
import type { Feature, Polygon } from 'geojson';
import type {
  DiabetesType,
  GlucoseUnits,
  MeasurementSeries,
  MeasurementValues,
  ParkesOptions,
  ParkesResult,
  ParkesZone,
} from '../types/index.js';
import { ParkesOptionsSchema } from '../types/schemas/index.js';
import { CLARKE, MIN_PAIRS, PARKES } from '../config/defaults.js';
import type { ComparisonError } from '../api/errors.js';
import { assertValidMeasurements, parseOptions } from '../api/validators.js';
import { lazyLog } from '../utils/logger-helpers.js';
import { resultifySync, type Result } from '../utils/result-helpers.js';

type Vertex = readonly [number, number];

interface Boundary {
  zone: ParkesZone;
  /** Above the identity line, closed against the top edge; below it, against the right edge */
  side: 'upper' | 'lower';
  vertices: readonly Vertex[];
  /** Last leg, continued to the plot edge */
  ray: { from: Vertex; slope: number };
}

const ZONES: readonly ParkesZone[] = ['A', 'B', 'C', 'D', 'E'];

function ray(from: Vertex, towards: Vertex): Boundary['ray'] {
  return { from, slope: (towards[1] - from[1]) / (towards[0] - from[0]) };
}

// Later entries take precedence
const BOUNDARIES: Record<DiabetesType, readonly Boundary[]> = {
  1: [
    { zone: 'B', side: 'lower', vertices: [[50, 0], [50, 30], [170, 145], [385, 300]], ray: ray([385, 300], [550, 450]) },
    { zone: 'B', side: 'upper', vertices: [[0, 50], [30, 50], [140, 170], [280, 380]], ray: ray([280, 380], [430, 550]) },
    { zone: 'C', side: 'lower', vertices: [[120, 0], [120, 30], [260, 130]], ray: ray([260, 130], [550, 250]) },
    { zone: 'C', side: 'upper', vertices: [[0, 60], [30, 60], [50, 80], [70, 110]], ray: ray([70, 110], [260, 550]) },
    { zone: 'D', side: 'lower', vertices: [[250, 0], [250, 40]], ray: ray([250, 40], [550, 150]) },
    { zone: 'D', side: 'upper', vertices: [[0, 100], [25, 100], [50, 125], [80, 215]], ray: ray([80, 215], [125, 550]) },
    { zone: 'E', side: 'upper', vertices: [[0, 150], [35, 155]], ray: ray([35, 155], [50, 550]) },
  ],
  2: [
    { zone: 'B', side: 'lower', vertices: [[50, 0], [50, 30], [90, 80], [330, 230]], ray: ray([330, 230], [550, 450]) },
    { zone: 'B', side: 'upper', vertices: [[0, 50], [30, 50], [230, 330]], ray: ray([230, 330], [440, 550]) },
    { zone: 'C', side: 'lower', vertices: [[90, 0], [260, 130]], ray: ray([260, 130], [550, 250]) },
    { zone: 'C', side: 'upper', vertices: [[0, 60], [30, 60]], ray: ray([30, 60], [280, 550]) },
    { zone: 'D', side: 'lower', vertices: [[250, 0], [250, 40], [410, 110]], ray: ray([410, 110], [550, 160]) },
    { zone: 'D', side: 'upper', vertices: [[0, 80], [25, 80], [35, 90]], ray: ray([35, 90], [125, 550]) },
    { zone: 'E', side: 'upper', vertices: [[0, 200], [35, 200]], ray: ray([35, 200], [50, 550]) },
  ],
};

interface Region {
  zone: ParkesZone;
  shape: Feature<Polygon>;
}

function closeRegion(boundary: Boundary, maxX: number, maxY: number): Region {
  const { from, slope } = boundary.ray;
  const ring: Vertex[] =
    boundary.side === 'upper'
      ? [...boundary.vertices, [from[0] + (maxY - from[1]) / slope, maxY], [0, maxY]]
      : [...boundary.vertices, [maxX, from[1] + (maxX - from[0]) * slope], [maxX, 0]];
  ring.push(ring[0]);

  return { zone: boundary.zone, shape: polygon([ring.map(([x, y]) => [x, y])]) };
}

/**
 * Zone regions for one grid, with axes (in mg/dL) covering every reading
 */
function buildGrid(type: DiabetesType, maxReference: number, maxTest: number): Region[] {
  const maxX = Math.max(maxReference + PARKES.AXIS_MARGIN, PARKES.AXIS_LIMIT);
  const maxY = Math.max(maxTest + PARKES.AXIS_MARGIN, maxX);
  return BOUNDARIES[type].map((boundary) => closeRegion(boundary, maxX, maxY));
}

function classify(grid: readonly Region[], reference: number, test: number): ParkesZone {
  let zone: ParkesZone = 'A';
  for (const region of grid) {
    if (booleanPointInPolygon([reference, test], region.shape, { ignoreBoundary: true })) {
      zone = region.zone;
    }
  }
  return zone;
}

function toMgDl(value: number, units: GlucoseUnits): number {
  return units === 'mmol' ? value * CLARKE.MMOL_FACTOR : value;
}

/**
 * Zone of a single reading pair. Points on a boundary belong to the zone
 * nearer the identity line.
 */
export function parkesZone(
  reference: number,
  test: number,
  type: DiabetesType = PARKES.DEFAULT_TYPE,
  units: GlucoseUnits = PARKES.DEFAULT_UNITS
): ParkesZone {
  const x = toMgDl(reference, units);
  const y = toMgDl(test, units);
  return classify(buildGrid(type, x, y), x, y);
}

function emptyTally(): Record<ParkesZone, number> {
  return { A: 0, B: 0, C: 0, D: 0, E: 0 };
}

/**
 * Classify every pair of a validated series (x = reference, y = test)
 */
export function computeParkesZones(
  series: MeasurementSeries,
  options: ParkesOptions = {},
  logger?: Logger
): ParkesResult {
  const type = options.type ?? PARKES.DEFAULT_TYPE;
  const units = options.units ?? PARKES.DEFAULT_UNITS;
  const n = series.length;

  const points = series.map(({ x, y }) => [toMgDl(x, units), toMgDl(y, units)] as const);
  const grid = buildGrid(
    type,
    Math.max(...points.map(([x]) => x)),
    Math.max(...points.map(([, y]) => y))
  );

  const zones = points.map(([x, y]) => classify(grid, x, y));
  const counts = emptyTally();
  for (const zone of zones) {
    counts[zone]++;
  }

  const percentages = emptyTally();
  for (const zone of ZONES) {
    percentages[zone] = (counts[zone] / n) * 100;
  }

  lazyLog(logger, 'debug', () => ({ analysis: 'parkes', n, type, units, ...counts }), 'Parkes zones assigned');

  return Object.freeze({
    n,
    type,
    units,
    zones: Object.freeze(zones),
    counts: Object.freeze(counts),
    percentages: Object.freeze(percentages),
  });
}

/**
 * Parkes error grid zones for reference and test glucose readings.
 *
 * @example
 * ```typescript
 * const result = parkesZones([100, 20], [100, 400], { type: 1 });
 * // result.val.zones => ['A', 'E']
 * ```
 */
export function parkesZones(
  reference: MeasurementValues,
  test: MeasurementValues,
  options?: ParkesOptions,
  logger?: Logger
): Result<ParkesResult, ComparisonError> {
  return resultifySync(() => {
    const series = assertValidMeasurements(reference, test, {
      minPairs: MIN_PAIRS.PARKES,
      analysis: 'Parkes error grid',
    });
    const parsed = parseOptions(ParkesOptionsSchema, options);
    return computeParkesZones(series, parsed, logger);
  });
}
