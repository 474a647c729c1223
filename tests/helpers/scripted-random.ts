/**
 * Scripted random source for testing.
 *
 * Replays predetermined draws so tests can force exact outcomes
 * (a Bernoulli hit, the shortest issue duration, a given destination).
 */

import type { RandomSource } from '../../src/core/random.js';

export class ScriptedRandom implements RandomSource {
  private readonly values: number[];
  private index = 0;

  /**
   * @param values - draws to replay, each in [0, 1)
   * @param fallback - value returned once the script is exhausted; omit to throw instead
   */
  constructor(
    values: number[],
    private readonly fallback?: number
  ) {
    this.values = [...values];
  }

  next(): number {
    const value = this.values[this.index];
    if (value !== undefined) {
      this.index++;
      return value;
    }
    if (this.fallback !== undefined) {
      return this.fallback;
    }
    throw new Error(
      `ScriptedRandom: script exhausted after ${String(this.values.length)} draws. Did you forget to add a value?`
    );
  }

  /** Draws consumed from the script so far. */
  get consumed(): number {
    return this.index;
  }
}
