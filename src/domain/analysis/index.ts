export { analyzeExperiment } from './ExperimentAnalysis';
export type {
  AnalysisOptions,
  ExperimentAnalysis,
  TreatmentComparison,
  WinnerReport,
} from './ExperimentAnalysis';
