/**
 * Seeded random number generation for simulations
 */

import { Random, MersenneTwister19937 } from 'random-js';
import { AdliftError, ErrorCode } from '../errors';

/**
 * Seeded random number generator using Mersenne Twister
 */
export class RNG {
  private random: Random;

  constructor(seed?: number) {
    const engine =
      seed !== undefined ? MersenneTwister19937.seed(seed) : MersenneTwister19937.autoSeed();
    this.random = new Random(engine);
  }

  /**
   * Reset the RNG with a new seed
   */
  setSeed(seed: number): void {
    this.random = new Random(MersenneTwister19937.seed(seed));
  }

  /**
   * Uniform random in [0, 1)
   */
  uniform(): number {
    return this.random.real(0, 1, false);
  }

  /**
   * Integer in range [min, max] inclusive
   */
  integer(min: number, max: number): number {
    return this.random.integer(min, max);
  }

  bernoulli(p: number): boolean {
    return this.uniform() < p;
  }

  /**
   * Number of successes in n Bernoulli(p) trials
   */
  binomial(n: number, p: number): number {
    if (!Number.isInteger(n) || n < 0 || p < 0 || p > 1) {
      throw new AdliftError(ErrorCode.INVALID_INPUT, 'Binomial parameters out of range', { n, p });
    }

    let successes = 0;
    for (let i = 0; i < n; i++) {
      if (this.bernoulli(p)) successes++;
    }
    return successes;
  }
}
