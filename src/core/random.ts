/**
 * Randomness for the simulation.
 *
 * Every stochastic draw goes through a RandomSource so runs are reproducible
 * from a seed and tests can script exact draws.
 */

/**
 * Source of uniform floats in [0, 1).
 */
export interface RandomSource {
  next(): number;
}

/**
 * Deterministic seeded PRNG (Mulberry32).
 */
export class SeededRandom implements RandomSource {
  private state: number;
  readonly seed: number;

  constructor(seed: number | string) {
    this.state = SeededRandom.seedToUint32(seed);
    this.seed = this.state;
  }

  /** Convert a seed to an unsigned 32-bit integer (FNV-1a for strings). */
  static seedToUint32(seed: number | string): number {
    if (typeof seed === 'number') {
      return seed >>> 0 || 1;
    }

    let h = 0x811c9dc5;
    for (let i = 0; i < seed.length; i++) {
      h ^= seed.charCodeAt(i);
      h = Math.imul(h, 0x01000193);
    }
    return h >>> 0 || 1;
  }

  next(): number {
    let t = (this.state += 0x6d2b79f5);
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }
}

/**
 * Generate a fresh seed when none is configured.
 */
export function generateSeed(): number {
  return Math.floor(Math.random() * 4294967296) >>> 0;
}

/** Uniform float in [min, max). */
export function uniform(rng: RandomSource, min: number, max: number): number {
  return min + rng.next() * (max - min);
}

/** Uniform integer in [min, max], both inclusive. */
export function randomInt(rng: RandomSource, min: number, max: number): number {
  return min + Math.floor(rng.next() * (max - min + 1));
}

/** Bernoulli trial with success probability `p`. */
export function chance(rng: RandomSource, p: number): boolean {
  return rng.next() < p;
}

/** Exponential draw with the given mean. */
export function exponential(rng: RandomSource, mean: number): number {
  return -Math.log(1 - rng.next()) * mean;
}

/** Choose one element from a non-empty array. */
export function choice<T>(rng: RandomSource, items: readonly T[]): T {
  const item = items[Math.floor(rng.next() * items.length)];
  if (item === undefined) {
    throw new Error('Cannot choose from an empty list');
  }
  return item;
}

/** Round to one decimal place. */
export function round1(value: number): number {
  return Math.round(value * 10) / 10;
}
