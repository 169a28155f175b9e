/**
 * Result types for the significance engine
 */

/**
 * Outcome of a two-proportion Z-test of a variant against control
 */
export interface SignificanceResult {
  /** Two-sided p-value */
  pValue: number;
  /**
   * Relative change of the variant's rate vs control, in percent.
   * Infinity when control's rate is 0 and the variant's is not.
   */
  liftPct: number;
  /** (1 - pValue) * 100 */
  confidencePct: number;
  /** Positive when the variant's rate is higher */
  zScore: number;
  /** Observed control proportion */
  controlRate: number;
  /** Observed variant proportion */
  variantRate: number;
  /** True when the pooled standard error is 0 and no test was possible */
  degenerate: boolean;
}

/**
 * Inputs to a sample-size calculation
 */
export interface SampleSizePlan {
  baselineRate: number;
  /** Relative effect, e.g. 0.2 for +20% */
  minimumDetectableEffect: number;
  alpha?: number;
  power?: number;
}
