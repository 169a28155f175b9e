/**
 * Derived per-variant ad metrics
 *
 * Rates are returned as fractions (0.02, not 2%). A metric whose denominator
 * is zero is null; formatting is left to the caller.
 */

import type {
  ProportionCounts,
  ProportionMetric,
  VariantObservation,
  WinnerMetric,
} from '../types';

export interface VariantMetrics {
  /** clicks / impressions */
  ctr: number | null;
  /** conversions / clicks */
  cvr: number | null;
  /** revenue / cost */
  roas: number | null;
  /** cost / conversions */
  cpa: number | null;
}

function ratio(numerator: number, denominator: number): number | null {
  return denominator === 0 ? null : numerator / denominator;
}

export function computeVariantMetrics(observation: VariantObservation): VariantMetrics {
  return {
    ctr: ratio(observation.clicks, observation.impressions),
    cvr: ratio(observation.conversions, observation.clicks),
    roas: ratio(observation.revenue, observation.cost),
    cpa: ratio(observation.cost, observation.conversions),
  };
}

/**
 * Value of a single winner metric, or null when it is undefined
 */
export function metricValue(observation: VariantObservation, metric: WinnerMetric): number | null {
  switch (metric) {
    case 'CTR':
      return ratio(observation.clicks, observation.impressions);
    case 'CVR':
      return ratio(observation.conversions, observation.clicks);
    case 'ROAS':
      return ratio(observation.revenue, observation.cost);
  }
}

/**
 * Pick the numerator/denominator pair a proportion metric is built from
 */
export function proportionCounts(
  observation: VariantObservation,
  metric: ProportionMetric
): ProportionCounts {
  switch (metric) {
    case 'CTR':
      return { successes: observation.clicks, trials: observation.impressions };
    case 'CVR':
      return { successes: observation.conversions, trials: observation.clicks };
    case 'IMPRESSION_CVR':
      return { successes: observation.conversions, trials: observation.impressions };
  }
}

/**
 * Relative change of value against base, in percent.
 *
 * A zero base has no defined lift: the result is 0 when value is also 0 and
 * Infinity (with the sign of value) otherwise.
 */
export function relativeLiftPct(base: number, value: number): number {
  if (base === 0) {
    if (value === 0) return 0;
    return value > 0 ? Infinity : -Infinity;
  }
  return ((value - base) / base) * 100;
}
