/**
 * Normal Distribution
 * Deterministic density, CDF and quantile backed by jstat
 */

import jStat from 'jstat';
import { AdliftError, ErrorCode } from '../errors';

/**
 * Normal distribution with fixed mean and standard deviation
 */
export class NormalDistribution {
  constructor(
    private readonly meanValue: number,
    private readonly stdDevValue: number
  ) {
    if (!Number.isFinite(meanValue) || !Number.isFinite(stdDevValue) || stdDevValue <= 0) {
      throw new AdliftError(
        ErrorCode.INVALID_INPUT,
        `Invalid Normal parameters: mean=${meanValue}, stdDev=${stdDevValue}. Standard deviation must be positive.`,
        { mean: meanValue, stdDev: stdDevValue }
      );
    }
  }

  pdf(x: number): number {
    return jStat.normal.pdf(x, this.meanValue, this.stdDevValue);
  }

  /**
   * Cumulative distribution function Φ
   */
  cdf(x: number): number {
    if (x === Infinity) return 1;
    if (x === -Infinity) return 0;
    return jStat.normal.cdf(x, this.meanValue, this.stdDevValue);
  }

  /**
   * Inverse CDF (quantile function) Φ⁻¹
   */
  quantile(p: number): number {
    if (Number.isNaN(p) || p < 0 || p > 1) {
      throw new AdliftError(ErrorCode.INVALID_INPUT, `Probability must be in [0, 1], got ${p}`, {
        p,
      });
    }
    if (p === 0) return -Infinity;
    if (p === 1) return Infinity;
    return jStat.normal.inv(p, this.meanValue, this.stdDevValue);
  }

  mean(): number {
    return this.meanValue;
  }

  variance(): number {
    return this.stdDevValue * this.stdDevValue;
  }

  getParameters(): { mean: number; stdDev: number } {
    return { mean: this.meanValue, stdDev: this.stdDevValue };
  }
}

/**
 * Shared N(0, 1) used by the significance and sample-size routines
 */
export const STANDARD_NORMAL = new NormalDistribution(0, 1);

/**
 * Standard normal distribution N(0, 1)
 */
export function createStandardNormal(): NormalDistribution {
  return new NormalDistribution(0, 1);
}
