import { PrometheusMetricsAdapter } from '@/modules/carbon/infrastructure/adapters/metrics';

describe('PrometheusMetricsAdapter', () => {
  it('renders counters with their labels', () => {
    const metrics = new PrometheusMetricsAdapter();
    metrics.incrementEstimate({ path: 'dish', outcome: 'success' });
    metrics.incrementEstimate({ path: 'dish', outcome: 'success' });
    metrics.incrementFallback('http_5xx');
    metrics.incrementCacheEvent('hit');
    metrics.incrementProviderCall({ kind: 'vision', outcome: 'failed' });
    metrics.incrementProviderRetry('text');

    const lines = metrics.renderPrometheus().split('\n');

    expect(lines).toContain('# TYPE carbon_estimates_total counter');
    expect(lines).toContain('carbon_estimates_total{path="dish",outcome="success"} 2');
    expect(lines).toContain('carbon_fallback_total{reason="http_5xx"} 1');
    expect(lines).toContain('carbon_cache_events_total{event="hit"} 1');
    expect(lines).toContain('carbon_provider_calls_total{kind="vision",outcome="failed"} 1');
    expect(lines).toContain('carbon_provider_retries_total{kind="text"} 1');
  });

  it('renders the latency histogram', () => {
    const metrics = new PrometheusMetricsAdapter();
    metrics.observeEstimateLatency({ path: 'image', seconds: 3 });

    const lines = metrics.renderPrometheus().split('\n');

    expect(lines).toContain('carbon_estimate_latency_seconds_bucket{path="image",le="5"} 1');
    expect(lines).toContain('carbon_estimate_latency_seconds_bucket{path="image",le="+Inf"} 1');
    expect(lines).not.toContain('carbon_estimate_latency_seconds_bucket{path="image",le="2"} 1');
    expect(lines).toContain('carbon_estimate_latency_seconds_sum{path="image"} 3');
    expect(lines).toContain('carbon_estimate_latency_seconds_count{path="image"} 1');
  });

  it('escapes label values', () => {
    const metrics = new PrometheusMetricsAdapter();
    metrics.incrementFallback('say "hi"');

    expect(metrics.renderPrometheus()).toContain('carbon_fallback_total{reason="say \\"hi\\""} 1');
  });

  it('renders gauges passed in at scrape time', () => {
    const metrics = new PrometheusMetricsAdapter();

    const lines = metrics
      .renderPrometheus({ resultCacheEntries: 3, providerQueueDepth: 1, emissionFactors: 20 })
      .split('\n');

    expect(lines).toContain('# TYPE carbon_result_cache_entries gauge');
    expect(lines).toContain('carbon_result_cache_entries 3');
    expect(lines).toContain('carbon_provider_queue_depth 1');
    expect(lines).toContain('carbon_emission_factors 20');
  });

  it('omits gauges that were not supplied', () => {
    const metrics = new PrometheusMetricsAdapter();

    expect(metrics.renderPrometheus()).not.toContain('carbon_provider_queue_depth');
  });
});
