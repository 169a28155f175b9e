import { describe, it, expect } from 'vitest';
import { NormalDistribution, STANDARD_NORMAL } from '../../core/distributions';
import { AdliftError } from '../../core/errors';

describe('NormalDistribution', () => {
  describe('standard normal', () => {
    it('should have cdf(0) = 0.5', () => {
      expect(STANDARD_NORMAL.cdf(0)).toBeCloseTo(0.5, 12);
    });

    it('should match known CDF values', () => {
      expect(STANDARD_NORMAL.cdf(1.959963984540054)).toBeCloseTo(0.975, 8);
      expect(STANDARD_NORMAL.cdf(-1)).toBeCloseTo(0.15865525393145707, 8);
      expect(STANDARD_NORMAL.cdf(2.016298745840035)).toBeCloseTo(0.9781156270037056, 8);
    });

    it('should match known quantiles', () => {
      expect(STANDARD_NORMAL.quantile(0.975)).toBeCloseTo(1.959963984540054, 6);
      expect(STANDARD_NORMAL.quantile(0.8)).toBeCloseTo(0.8416212335729143, 6);
      expect(STANDARD_NORMAL.quantile(0.5)).toBeCloseTo(0, 8);
    });

    it('should invert its own CDF', () => {
      for (const p of [0.01, 0.1, 0.3, 0.7, 0.9, 0.995]) {
        expect(STANDARD_NORMAL.cdf(STANDARD_NORMAL.quantile(p))).toBeCloseTo(p, 8);
      }
    });

    it('should be symmetric around the mean', () => {
      expect(STANDARD_NORMAL.cdf(-1.5) + STANDARD_NORMAL.cdf(1.5)).toBeCloseTo(1, 12);
    });

    it('should handle infinite arguments and boundary probabilities', () => {
      expect(STANDARD_NORMAL.cdf(Infinity)).toBe(1);
      expect(STANDARD_NORMAL.cdf(-Infinity)).toBe(0);
      expect(STANDARD_NORMAL.quantile(0)).toBe(-Infinity);
      expect(STANDARD_NORMAL.quantile(1)).toBe(Infinity);
    });

    it('should reject probabilities outside [0, 1]', () => {
      expect(() => STANDARD_NORMAL.quantile(1.2)).toThrow(AdliftError);
      expect(() => STANDARD_NORMAL.quantile(-0.1)).toThrow(AdliftError);
      expect(() => STANDARD_NORMAL.quantile(NaN)).toThrow(AdliftError);
    });
  });

  describe('shifted and scaled', () => {
    const dist = new NormalDistribution(10, 2);

    it('should standardize through mean and stdDev', () => {
      expect(dist.cdf(10)).toBeCloseTo(0.5, 12);
      expect(dist.quantile(0.975)).toBeCloseTo(10 + 2 * 1.959963984540054, 5);
      expect(dist.mean()).toBe(10);
      expect(dist.variance()).toBe(4);
    });

    it('should have peak density 1 / (σ√(2π))', () => {
      expect(dist.pdf(10)).toBeCloseTo(1 / (2 * Math.sqrt(2 * Math.PI)), 12);
    });
  });

  it('should reject non-positive standard deviation', () => {
    expect(() => new NormalDistribution(0, 0)).toThrow(AdliftError);
    expect(() => new NormalDistribution(0, -1)).toThrow('Standard deviation must be positive');
  });
});
