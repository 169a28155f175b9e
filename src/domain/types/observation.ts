/**
 * Variant Data Structures
 *
 * Aggregated ad-performance counts for one variant over a date window.
 * The aggregation itself happens upstream; these are the values it hands over.
 */

/**
 * Summed performance of one variant
 */
export interface VariantObservation {
  readonly impressions: number;
  readonly clicks: number;
  readonly conversions: number;
  readonly cost: number;
  readonly revenue: number;
}

/**
 * A variant observation with its display label.
 * Position in a list matters: the first entry is the control.
 */
export interface LabeledObservation {
  readonly label: string;
  readonly observation: VariantObservation;
}

/**
 * The numerator/denominator pair a proportion test compares
 */
export interface ProportionCounts {
  readonly successes: number;
  readonly trials: number;
}

/**
 * Proportions a Z-test can be run on
 * - CTR: clicks / impressions
 * - CVR: conversions / clicks
 * - IMPRESSION_CVR: conversions / impressions
 */
export type ProportionMetric = 'CTR' | 'CVR' | 'IMPRESSION_CVR';

/**
 * Metrics a winner can be picked on
 */
export type WinnerMetric = 'CTR' | 'CVR' | 'ROAS';
