/**
 * Math Helper Utilities
 *
 * Descriptive statistics over numeric sequences. Callers validate their
 * input first; these helpers guard only against empty sequences.
 */

/**
 * Sum of a sequence
 *
 * @example
 * ```typescript
 * sum([1, 2, 3])  // => 6
 * sum([])         // => 0
 * ```
 */
export function sum(values: ArrayLike<number>): number {
  let total = 0;
  for (let i = 0; i < values.length; i++) {
    total += values[i];
  }
  return total;
}

/**
 * Arithmetic mean
 *
 * @param values - Numbers to average
 * @param defaultValue - Value to return if the sequence is empty (default: 0)
 *
 * @example
 * ```typescript
 * mean([1, 2, 3])   // => 2
 * mean([], NaN)     // => NaN
 * ```
 */
export function mean(values: ArrayLike<number>, defaultValue = 0): number {
  if (values.length === 0) {
    return defaultValue;
  }
  return sum(values) / values.length;
}

/**
 * Sample variance (n - 1 denominator)
 *
 * Returns 0 for sequences shorter than two, where dispersion is undefined.
 */
export function sampleVariance(values: ArrayLike<number>): number {
  const n = values.length;
  if (n < 2) {
    return 0;
  }

  const center = mean(values);
  let squares = 0;
  for (let i = 0; i < n; i++) {
    const deviation = values[i] - center;
    squares += deviation * deviation;
  }
  return squares / (n - 1);
}

/**
 * Sample standard deviation (n - 1 denominator)
 */
export function sampleStdDev(values: ArrayLike<number>): number {
  return Math.sqrt(sampleVariance(values));
}

/**
 * Ascending copy of a sequence
 */
export function sortedCopy(values: ArrayLike<number>): number[] {
  return Array.from(values).sort((a, b) => a - b);
}

/**
 * Median; even-length sequences average the two central values
 *
 * @throws {RangeError} for an empty sequence
 */
export function median(values: ArrayLike<number>): number {
  if (values.length === 0) {
    throw new RangeError('Cannot take the median of an empty sequence');
  }

  const sorted = sortedCopy(values);
  const middle = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 1 ? sorted[middle] : (sorted[middle - 1] + sorted[middle]) / 2;
}

/**
 * Quantile of an ascending sequence at probability `p`
 *
 * Linear interpolation between the closest ranks, so `p = 0` is the minimum
 * and `p = 1` the maximum.
 *
 * @param sortedValues - Values sorted ascending
 * @param p - Probability in [0, 1]
 */
export function quantileSorted(sortedValues: ArrayLike<number>, p: number): number {
  if (sortedValues.length === 0) {
    throw new RangeError('Cannot take a quantile of an empty sequence');
  }
  if (p < 0 || p > 1) {
    throw new RangeError('Quantile probability must be between 0 and 1');
  }

  const index = p * (sortedValues.length - 1);
  const lower = Math.floor(index);
  const upper = Math.ceil(index);
  const weight = index - lower;

  if (lower === upper) {
    return sortedValues[lower];
  }

  return sortedValues[lower] * (1 - weight) + sortedValues[upper] * weight;
}

/**
 * Quantile of an unsorted sequence at probability `p`
 */
export function quantile(values: ArrayLike<number>, p: number): number {
  return quantileSorted(sortedCopy(values), p);
}

/**
 * `count` evenly spaced values from `start` to `stop`, both inclusive
 */
export function linspace(start: number, stop: number, count: number): number[] {
  if (count === 1) {
    return [start];
  }
  const step = (stop - start) / (count - 1);
  return Array.from({ length: count }, (_, i) => (i === count - 1 ? stop : start + i * step));
}
