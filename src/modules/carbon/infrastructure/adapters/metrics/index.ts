export { PrometheusMetricsAdapter } from './prometheus-metrics.adapter';
export type { MetricsGauges } from './prometheus-metrics.adapter';
