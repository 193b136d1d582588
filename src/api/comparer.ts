import { EventEmitter } from 'eventemitter3';
import type { Logger } from 'pino';
import { pino } from 'pino';
import type { Result } from '../utils/result-helpers.js';
import type { AnalysisResultMap, ComparerEvents } from './events.js';
import type { ComparisonError } from './errors.js';
import type {
  AnalysisKind,
  BlandAltmanOptions,
  BlandAltmanResult,
  ClarkeOptions,
  ClarkeResult,
  DemingOptions,
  DemingResult,
  LinearRegressionOptions,
  LinearRegressionResult,
  MeasurementValues,
  MountainOptions,
  MountainResult,
  ParkesOptions,
  ParkesResult,
  PassingBablokOptions,
  PassingBablokResult,
} from '../types/index.js';
import type { AnalysisConfig } from '../types/schemas/config.js';
import { resolveConfig, type ResolveConfigOptions } from '../config/loader.js';
import { blandAltman } from '../core/bland-altman.js';
import { passingBablok } from '../core/passing-bablok.js';
import { deming } from '../core/deming.js';
import { linearRegression } from '../core/linear-regression.js';
import { mountain } from '../core/mountain.js';
import { clarkeZones } from '../core/clarke-error-grid.js';
import { parkesZones } from '../core/parkes-error-grid.js';
import { lazyLog } from '../utils/logger-helpers.js';

/**
 * Instance configuration: an analysis profile (parsed or YAML text) and the
 * environment consulted for the log level.
 */
export type ComparerOptions = ResolveConfigOptions;

/**
 * Per-call value unless it is absent; an explicit `null` still wins
 */
function definedOr<T>(value: T | undefined, fallback: T): T {
  return value === undefined ? fallback : value;
}

export interface ComparerDependencies {
  logger?: Logger;
}

/**
 * High-level facade over every analysis.
 *
 * Holds the merged defaults of one analysis profile and a logger. Per-call
 * options override the profile. Each call returns a `Result` and emits an
 * event so a render layer can pick up finished analyses.
 *
 * Events:
 * - 'analysis:completed' - Emitted with the result of a successful analysis
 * - 'analysis:failed' - Emitted with the error of a rejected analysis
 */
export class MethodComparer extends EventEmitter<ComparerEvents> {
  private readonly config: AnalysisConfig;
  private readonly logger: Logger;

  /**
   * Create a comparer.
   *
   * @param options - Analysis profile and environment
   * @param dependencies - Optional logger; a pino logger at the configured level otherwise
   * @throws {ComparisonError} InvalidParams when the profile does not validate
   */
  constructor(options: ComparerOptions = {}, dependencies: ComparerDependencies = {}) {
    super();

    this.config = resolveConfig(options);
    this.logger = dependencies.logger ?? pino({ level: this.config.logging.level });
  }

  /**
   * Effective configuration after merging the profile over the defaults
   */
  public getConfig(): AnalysisConfig {
    return this.config;
  }

  public blandAltman(
    method1: MeasurementValues,
    method2: MeasurementValues,
    options: BlandAltmanOptions = {}
  ): Result<BlandAltmanResult, ComparisonError> {
    const section = this.config.bland_altman;
    const merged: BlandAltmanOptions = {
      ...options,
      mode: definedOr(options.mode, section.mode),
      zMultiplier: definedOr(options.zMultiplier, section.z_multiplier),
      confidenceLevel: definedOr(options.confidenceLevel, section.confidence_level),
    };
    return this.run('bland-altman', () => blandAltman(method1, method2, merged, this.logger));
  }

  public passingBablok(
    method1: MeasurementValues,
    method2: MeasurementValues,
    options: PassingBablokOptions = {}
  ): Result<PassingBablokResult, ComparisonError> {
    const merged: PassingBablokOptions = {
      ...options,
      confidenceLevel: definedOr(options.confidenceLevel, this.config.passing_bablok.confidence_level),
    };
    return this.run('passing-bablok', () => passingBablok(method1, method2, merged, this.logger));
  }

  public deming(
    method1: MeasurementValues,
    method2: MeasurementValues,
    options: DemingOptions = {}
  ): Result<DemingResult, ComparisonError> {
    const section = this.config.deming;
    const merged: DemingOptions = {
      ...options,
      confidenceLevel: definedOr(options.confidenceLevel, section.confidence_level),
      varianceRatio: definedOr(options.varianceRatio, section.variance_ratio),
      bootstrap: definedOr(options.bootstrap, section.bootstrap),
      seed: definedOr(options.seed, section.seed),
    };
    return this.run('deming', () => deming(method1, method2, merged, this.logger));
  }

  public linear(
    method1: MeasurementValues,
    method2: MeasurementValues,
    options: LinearRegressionOptions = {}
  ): Result<LinearRegressionResult, ComparisonError> {
    const merged: LinearRegressionOptions = {
      ...options,
      confidenceLevel: definedOr(options.confidenceLevel, this.config.linear.confidence_level),
    };
    return this.run('linear', () => linearRegression(method1, method2, merged, this.logger));
  }

  public mountain(
    method1: MeasurementValues,
    method2: MeasurementValues,
    options: MountainOptions = {}
  ): Result<MountainResult, ComparisonError> {
    const section = this.config.mountain;
    const merged: MountainOptions = {
      ...options,
      percentiles: definedOr(options.percentiles, section.percentiles),
      centralRange: definedOr(options.centralRange, section.central_range),
    };
    return this.run('mountain', () => mountain(method1, method2, merged, this.logger));
  }

  public clarke(
    reference: MeasurementValues,
    test: MeasurementValues,
    options: ClarkeOptions = {}
  ): Result<ClarkeResult, ComparisonError> {
    const merged: ClarkeOptions = {
      ...options,
      units: definedOr(options.units, this.config.clarke.units),
    };
    return this.run('clarke', () => clarkeZones(reference, test, merged, this.logger));
  }

  public parkes(
    reference: MeasurementValues,
    test: MeasurementValues,
    options: ParkesOptions = {}
  ): Result<ParkesResult, ComparisonError> {
    const section = this.config.parkes;
    const merged: ParkesOptions = {
      ...options,
      type: definedOr(options.type, section.type),
      units: definedOr(options.units, section.units),
    };
    return this.run('parkes', () => parkesZones(reference, test, merged, this.logger));
  }

  private run<K extends AnalysisKind>(
    kind: K,
    analysis: () => Result<AnalysisResultMap[K], ComparisonError>
  ): Result<AnalysisResultMap[K], ComparisonError> {
    const startedAt = Date.now();
    const result = analysis();
    const timestamp = Date.now();

    if (result.ok) {
      this.emit('analysis:completed', {
        kind,
        result: result.val,
        durationMs: timestamp - startedAt,
        timestamp,
      });
    } else {
      const error = result.val;
      lazyLog(
        this.logger,
        'debug',
        () => ({ analysis: kind, code: error.code, details: error.details }),
        `Analysis rejected: ${error.message}`
      );
      this.emit('analysis:failed', { kind, error, timestamp });
    }

    return result;
  }
}

/**
 * Convenience factory for creating a comparer.
 *
 * @example
 * ```typescript
 * const comparer = createComparer({ profile: 'bland_altman:\n  mode: relative\n' });
 * comparer.on('analysis:completed', ({ kind, result }) => render(kind, result));
 * comparer.blandAltman(reference, candidate);
 * ```
 */
export function createComparer(
  options: ComparerOptions = {},
  dependencies: ComparerDependencies = {}
): MethodComparer {
  return new MethodComparer(options, dependencies);
}
