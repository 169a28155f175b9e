export { computeVariantMetrics, metricValue, proportionCounts, relativeLiftPct } from './VariantMetrics';
export type { VariantMetrics } from './VariantMetrics';
