/**
 * adlift - A/B-test statistics for ad performance data
 *
 * Two-proportion significance tests, sample-size planning and winner
 * selection over aggregated impressions, clicks, conversions, cost and revenue.
 */

// Core: errors, defaults, distributions, random numbers
export {
  AdliftError,
  ErrorCode,
  isAdliftError,
  wrapError,
  STATISTICAL_DEFAULTS,
  ANALYSIS_DEFAULTS,
  NormalDistribution,
  STANDARD_NORMAL,
  createStandardNormal,
  RNG,
} from './core';

// Data model
export type {
  VariantObservation,
  LabeledObservation,
  ProportionCounts,
  ProportionMetric,
  WinnerMetric,
} from './domain/types';

// Validation and derived metrics
export { ObservationValidator } from './domain/validation';
export {
  computeVariantMetrics,
  metricValue,
  proportionCounts,
  relativeLiftPct,
} from './domain/metrics';
export type { VariantMetrics } from './domain/metrics';

// Significance engine
export {
  compareProportions,
  compareTwoProportions,
  isSignificant,
  requiredSampleSize,
  pickWinner,
} from './significance';
export type { SignificanceResult, SampleSizePlan } from './significance';

// Experiment analysis
export { analyzeExperiment } from './domain/analysis';
export type {
  AnalysisOptions,
  ExperimentAnalysis,
  TreatmentComparison,
  WinnerReport,
} from './domain/analysis';

// Planning and simulation
export { planTest, PowerSimulator } from './power';
export type { TestPlan, TestPlanInput, SimulationScenario, PowerAnalysisResult } from './power';

export const VERSION = '0.1.0';
