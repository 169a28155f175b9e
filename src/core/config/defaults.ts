/**
 * Default settings applied when a caller leaves an option out
 */

import type { ProportionMetric, WinnerMetric } from '../../domain/types';

export const STATISTICAL_DEFAULTS = Object.freeze({
  /** Two-sided significance level */
  alpha: 0.05,
  /** Probability of detecting a true effect of the planned size */
  power: 0.8,
  /** Arms in a planned test */
  variantCount: 2,
  /** Monte-Carlo draws per simulation */
  simulationIterations: 500,
});

export const ANALYSIS_DEFAULTS: Readonly<{
  proportionMetric: ProportionMetric;
  winnerMetric: WinnerMetric;
}> = Object.freeze({
  proportionMetric: 'CTR',
  winnerMetric: 'CTR',
});
