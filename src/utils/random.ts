/**
 * Seeded pseudo-random numbers
 *
 * FNV-1a hashes the seed string into a 32-bit state that drives a
 * mulberry32 generator. The same seed always yields the same sequence.
 */

export type RandomSource = () => number;

/**
 * 32-bit FNV-1a hash of a string
 */
export function hashSeed(seed: string): number {
  let hash = 2166136261 >>> 0;
  for (let i = 0; i < seed.length; i++) {
    hash ^= seed.charCodeAt(i);
    hash = Math.imul(hash, 16777619);
  }
  return hash >>> 0;
}

/**
 * Uniform generator over [0, 1) seeded from a string
 *
 * @example
 * ```typescript
 * const random = createSeededRandom('method-agreement');
 * random(); // same value on every run
 * ```
 */
export function createSeededRandom(seed: string): RandomSource {
  let state = hashSeed(seed);
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Uniform integer in [0, upper)
 */
export function randomIndex(random: RandomSource, upper: number): number {
  return Math.min(upper - 1, Math.floor(random() * upper));
}
