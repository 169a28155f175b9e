export type {
  VariantObservation,
  LabeledObservation,
  ProportionCounts,
  ProportionMetric,
  WinnerMetric,
} from './observation';
