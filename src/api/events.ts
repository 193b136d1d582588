/**
 * Comparer Event System
 *
 * Defines event types and payloads for the MethodComparer class. A render
 * layer subscribes to these to draw plots from finished results.
 */

import type {
  AnalysisKind,
  BlandAltmanResult,
  ClarkeResult,
  DemingResult,
  LinearRegressionResult,
  MountainResult,
  ParkesResult,
  PassingBablokResult,
} from '../types/index.js';
import type { ComparisonError } from './errors.js';

/**
 * Result type produced by each analysis
 */
export interface AnalysisResultMap {
  'bland-altman': BlandAltmanResult;
  'passing-bablok': PassingBablokResult;
  deming: DemingResult;
  linear: LinearRegressionResult;
  mountain: MountainResult;
  clarke: ClarkeResult;
  parkes: ParkesResult;
}

export type AnalysisResult = AnalysisResultMap[AnalysisKind];

/**
 * Event payload when an analysis finishes
 */
export interface AnalysisCompletedEvent {
  kind: AnalysisKind;
  result: AnalysisResult;
  durationMs: number;
  timestamp: number;
}

/**
 * Event payload when an analysis is rejected
 */
export interface AnalysisFailedEvent {
  kind: AnalysisKind;
  error: ComparisonError;
  timestamp: number;
}

/**
 * Map of all comparer events
 */
export interface ComparerEvents {
  'analysis:completed': (event: AnalysisCompletedEvent) => void;
  'analysis:failed': (event: AnalysisFailedEvent) => void;
}

export type ComparerEventName = keyof ComparerEvents;
export type ComparerEventHandler<T extends ComparerEventName> = ComparerEvents[T];
