export const CARBON_METRIC_ESTIMATES_TOTAL = 'carbon_estimates_total';
export const CARBON_METRIC_FALLBACK_TOTAL = 'carbon_fallback_total';
export const CARBON_METRIC_CACHE_EVENTS_TOTAL = 'carbon_cache_events_total';
export const CARBON_METRIC_PROVIDER_CALLS_TOTAL = 'carbon_provider_calls_total';
export const CARBON_METRIC_PROVIDER_RETRIES_TOTAL = 'carbon_provider_retries_total';
export const CARBON_METRIC_ESTIMATE_LATENCY_SECONDS = 'carbon_estimate_latency_seconds';
export const CARBON_METRIC_RESULT_CACHE_ENTRIES = 'carbon_result_cache_entries';
export const CARBON_METRIC_PROVIDER_QUEUE_DEPTH = 'carbon_provider_queue_depth';
export const CARBON_METRIC_EMISSION_FACTORS = 'carbon_emission_factors';

export const CARBON_ESTIMATE_LATENCY_BUCKETS = [0.5, 1, 2, 5, 10, 20, 40, 80, 160] as const;
