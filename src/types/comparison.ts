/**
 * Core data model for paired method comparison.
 *
 * Every result type is a readonly value object built once per analysis call.
 */

/**
 * How Bland-Altman differences are expressed.
 * - `absolute`: y - x in the measurement unit
 * - `relative`: (y - x) / mean * 100, a percentage of the pair mean
 */
export type DifferenceMode = 'absolute' | 'relative';

/**
 * One subject measured by method 1 (`x`) and method 2 (`y`).
 */
export interface MeasurementPair {
  readonly x: number;
  readonly y: number;
}

/**
 * Index-aligned pairs from a single comparison run.
 */
export type MeasurementSeries = readonly MeasurementPair[];

/**
 * Raw measurements as accepted from callers: plain arrays or typed arrays.
 */
export type MeasurementValues = ArrayLike<number>;

/**
 * Closed interval `[lower, upper]` with `lower <= upper`.
 */
export interface Interval {
  readonly lower: number;
  readonly upper: number;
}

export interface BlandAltmanOptions {
  /** @default 'absolute' */
  mode?: DifferenceMode;
  /** Multiple of the SD at which the limits of agreement sit. @default 1.96 */
  zMultiplier?: number;
  /** Confidence level for bias and limit intervals; `null` skips them. @default 0.95 */
  confidenceLevel?: number | null;
}

export interface BlandAltmanIntervals {
  readonly bias: Interval;
  readonly lowerLimit: Interval;
  readonly upperLimit: Interval;
}

export interface BlandAltmanResult {
  readonly n: number;
  readonly mode: DifferenceMode;
  readonly zMultiplier: number;
  readonly confidenceLevel: number | null;
  /** Per-pair mean of the two methods */
  readonly means: readonly number[];
  /** Per-pair difference, absolute or relative */
  readonly differences: readonly number[];
  /** Mean difference */
  readonly bias: number;
  /** Sample standard deviation of the differences */
  readonly sdDifferences: number;
  readonly lowerLimit: number;
  readonly upperLimit: number;
  readonly confidenceIntervals: BlandAltmanIntervals | null;
}

export interface PassingBablokOptions {
  /** @default 0.95 */
  confidenceLevel?: number;
}

export interface PassingBablokDiagnostics {
  /** Slopes kept in the ranked set (N) */
  readonly slopeCount: number;
  /** Number of ranked slopes below -1, used to shift every rank */
  readonly offset: number;
  /** Pairs with equal x but different y */
  readonly excludedVertical: number;
  /** Pairs with equal x and equal y */
  readonly excludedDuplicate: number;
  /** Pairs whose slope is exactly -1 */
  readonly excludedMinusOne: number;
  /** True when fewer than three pairs make the interval lookup unreliable */
  readonly ciDegraded: boolean;
}

export interface PassingBablokResult {
  readonly n: number;
  readonly confidenceLevel: number;
  readonly slope: number;
  readonly intercept: number;
  readonly slopeCI: Interval;
  readonly interceptCI: Interval;
  /** Sorted pairwise slopes the estimate was ranked from */
  readonly slopes: readonly number[];
  readonly diagnostics: PassingBablokDiagnostics;
}

export interface DemingOptions {
  /** @default 0.95 */
  confidenceLevel?: number;
  /** Known ratio of the error variance of y to that of x. @default 1 */
  varianceRatio?: number;
  /** Bootstrap resamples for interval estimates; `null` skips them. @default 1000 */
  bootstrap?: number | null;
  /** Seed for the bootstrap generator. */
  seed?: string;
}

/**
 * A point estimate with optional bootstrap interval and standard error.
 */
export interface BootstrapEstimate {
  /** Fit on the full series */
  readonly estimate: number;
  /** Median of the bootstrap estimates */
  readonly bootstrapMedian: number | null;
  readonly ci: Interval | null;
  readonly standardError: number | null;
}

export interface DemingResult {
  readonly n: number;
  readonly confidenceLevel: number;
  readonly varianceRatio: number;
  readonly slope: BootstrapEstimate;
  readonly intercept: BootstrapEstimate;
  /** Estimated error SD of method 1 */
  readonly sigmaX: BootstrapEstimate;
  /** Estimated error SD of method 2 */
  readonly sigmaY: BootstrapEstimate;
  /** Resamples that contributed to the intervals (0 without bootstrap) */
  readonly bootstrapSamples: number;
}

export interface LinearRegressionOptions {
  /** @default 0.95 */
  confidenceLevel?: number;
}

export interface LinearRegressionResult {
  readonly n: number;
  readonly confidenceLevel: number;
  readonly slope: number;
  readonly intercept: number;
  readonly slopeCI: Interval;
  readonly interceptCI: Interval;
  readonly slopeStandardError: number;
  readonly interceptStandardError: number;
  readonly residualStandardError: number;
  readonly rSquared: number;
}

export interface MountainOptions {
  /** Number of evenly spaced probabilities evaluated. @default 100 */
  percentiles?: number;
  /** Central range in percent highlighted around the median. @default 68.27 */
  centralRange?: number;
}

export interface MountainResult {
  readonly n: number;
  /** Probabilities evaluated, 0 to 1 */
  readonly probabilities: readonly number[];
  /** Difference value at each probability */
  readonly quantiles: readonly number[];
  /** Folded CDF in percent at each probability */
  readonly mountain: readonly number[];
  /** Area under the folded curve */
  readonly auc: number;
  readonly median: number;
  readonly medianIndex: number;
  readonly centralRange: number;
  readonly rangeBounds: Interval;
  readonly rangeIndex: readonly [number, number];
}

export type GlucoseUnits = 'mg/dl' | 'mmol';

export type ErrorGridZone = 'A' | 'B' | 'C' | 'D' | 'E';

export type ClarkeZone = ErrorGridZone;

export interface ClarkeOptions {
  /** @default 'mg/dl' */
  units?: GlucoseUnits;
}

export interface ClarkeResult {
  readonly n: number;
  readonly units: GlucoseUnits;
  readonly zones: readonly ClarkeZone[];
  readonly counts: Readonly<Record<ClarkeZone, number>>;
  /** Share of pairs per zone, in percent */
  readonly percentages: Readonly<Record<ClarkeZone, number>>;
}

export type ParkesZone = ErrorGridZone;

/** Parkes consensus grid variant */
export type DiabetesType = 1 | 2;

export interface ParkesOptions {
  /** @default 1 */
  type?: DiabetesType;
  /** @default 'mg/dl' */
  units?: GlucoseUnits;
}

export interface ParkesResult {
  readonly n: number;
  readonly type: DiabetesType;
  readonly units: GlucoseUnits;
  readonly zones: readonly ParkesZone[];
  readonly counts: Readonly<Record<ParkesZone, number>>;
  /** Share of pairs per zone, in percent */
  readonly percentages: Readonly<Record<ParkesZone, number>>;
}

/**
 * Every analysis the library offers, used to tag events and log lines.
 */
export type AnalysisKind =
  | 'bland-altman'
  | 'passing-bablok'
  | 'deming'
  | 'linear'
  | 'mountain'
  | 'clarke'
  | 'parkes';
