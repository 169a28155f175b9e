/**
 * Experiment analysis: every treatment against control, plus the winner
 */

import type { LabeledObservation, ProportionMetric, WinnerMetric } from '../types';
import type { SignificanceResult } from '../../significance/types';
import { ObservationValidator } from '../validation';
import { metricValue, relativeLiftPct } from '../metrics';
import { compareTwoProportions, isSignificant } from '../../significance/ProportionTest';
import { pickWinner } from '../../significance/WinnerSelection';
import { ANALYSIS_DEFAULTS, STATISTICAL_DEFAULTS } from '../../core/config/defaults';

/**
 * Options for analyzing an experiment
 */
export interface AnalysisOptions {
  /** Proportion the Z-tests run on (defaults to 'CTR') */
  proportionMetric?: ProportionMetric;
  /** Metric the winner is picked on (defaults to 'CTR') */
  winnerMetric?: WinnerMetric;
  /** Significance level (defaults to 0.05) */
  alpha?: number;
}

export interface TreatmentComparison {
  label: string;
  result: SignificanceResult;
  significant: boolean;
}

export interface WinnerReport {
  label: string;
  /** Relative change of the winner's metric vs control; null when control's is undefined */
  improvementPct: number | null;
  /** winner.revenue - control.revenue */
  revenueImpact: number;
}

export interface ExperimentAnalysis {
  control: string;
  proportionMetric: ProportionMetric;
  winnerMetric: WinnerMetric;
  alpha: number;
  /** One entry per treatment, in input order */
  comparisons: TreatmentComparison[];
  winner: WinnerReport;
}

/**
 * Analyze an experiment whose first variant is the control
 */
export function analyzeExperiment(
  variants: readonly LabeledObservation[],
  options: AnalysisOptions = {}
): ExperimentAnalysis {
  const proportionMetric = options.proportionMetric ?? ANALYSIS_DEFAULTS.proportionMetric;
  const winnerMetric = options.winnerMetric ?? ANALYSIS_DEFAULTS.winnerMetric;
  const alpha = options.alpha ?? STATISTICAL_DEFAULTS.alpha;

  ObservationValidator.validateVariants(variants, 2);
  ObservationValidator.validateOpenUnitInterval('alpha', alpha);

  const [control, ...treatments] = variants;

  const comparisons = treatments.map(({ label, observation }) => {
    const result = compareTwoProportions(control.observation, observation, proportionMetric);
    return { label, result, significant: isSignificant(result, alpha) };
  });

  const winnerLabel = pickWinner(variants, winnerMetric);
  const winner = variants.find((v) => v.label === winnerLabel) ?? control;

  const controlValue = metricValue(control.observation, winnerMetric);
  const winnerValue = metricValue(winner.observation, winnerMetric);

  return {
    control: control.label,
    proportionMetric,
    winnerMetric,
    alpha,
    comparisons,
    winner: {
      label: winner.label,
      improvementPct:
        controlValue === null || winnerValue === null
          ? null
          : relativeLiftPct(controlValue, winnerValue),
      revenueImpact: winner.observation.revenue - control.observation.revenue,
    },
  };
}
