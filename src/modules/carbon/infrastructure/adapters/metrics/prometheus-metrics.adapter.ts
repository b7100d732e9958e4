import { Injectable } from '@nestjs/common';
import {
  CARBON_ESTIMATE_LATENCY_BUCKETS,
  CARBON_METRIC_CACHE_EVENTS_TOTAL,
  CARBON_METRIC_ESTIMATE_LATENCY_SECONDS,
  CARBON_METRIC_EMISSION_FACTORS,
  CARBON_METRIC_ESTIMATES_TOTAL,
  CARBON_METRIC_FALLBACK_TOTAL,
  CARBON_METRIC_PROVIDER_CALLS_TOTAL,
  CARBON_METRIC_PROVIDER_QUEUE_DEPTH,
  CARBON_METRIC_PROVIDER_RETRIES_TOTAL,
  CARBON_METRIC_RESULT_CACHE_ENTRIES,
} from '../../../../../common/metrics';
import type { CompletionKind } from '../../../application/ports/completion-provider.port';
import type {
  EstimateOutcome,
  EstimatePath,
  MetricsPort,
} from '../../../application/ports/metrics.port';

/** Point-in-time values read from the live components at scrape time. */
export interface MetricsGauges {
  resultCacheEntries?: number;
  providerQueueDepth?: number;
  emissionFactors?: number;
}

@Injectable()
export class PrometheusMetricsAdapter implements MetricsPort {
  private readonly estimates = new Map<string, number>();
  private readonly fallbacks = new Map<string, number>();
  private readonly cacheEvents = new Map<string, number>();
  private readonly providerCalls = new Map<string, number>();
  private readonly providerRetries = new Map<string, number>();

  private readonly latencyBuckets = new Map<string, number>();
  private readonly latencySum = new Map<string, number>();
  private readonly latencyCount = new Map<string, number>();

  incrementEstimate(input: { path: EstimatePath; outcome: EstimateOutcome }): void {
    increment(this.estimates, `${input.path}|${input.outcome}`);
  }

  observeEstimateLatency(input: { path: EstimatePath; seconds: number }): void {
    const path = input.path;
    const latency = Number.isFinite(input.seconds) && input.seconds >= 0 ? input.seconds : 0;

    this.latencySum.set(path, (this.latencySum.get(path) ?? 0) + latency);
    increment(this.latencyCount, path);

    for (const bucket of CARBON_ESTIMATE_LATENCY_BUCKETS) {
      if (latency <= bucket) {
        increment(this.latencyBuckets, `${path}|${bucket}`);
      }
    }

    increment(this.latencyBuckets, `${path}|+Inf`);
  }

  incrementFallback(reason: string): void {
    increment(this.fallbacks, sanitizeLabelValue(reason));
  }

  incrementCacheEvent(event: 'hit' | 'miss' | 'store'): void {
    increment(this.cacheEvents, event);
  }

  incrementProviderCall(input: { kind: CompletionKind; outcome: 'succeeded' | 'failed' }): void {
    increment(this.providerCalls, `${input.kind}|${input.outcome}`);
  }

  incrementProviderRetry(kind: CompletionKind): void {
    increment(this.providerRetries, kind);
  }

  renderPrometheus(gauges: MetricsGauges = {}): string {
    const lines: string[] = [];

    lines.push(`# HELP ${CARBON_METRIC_ESTIMATES_TOTAL} Total estimates served by path and outcome.`);
    lines.push(`# TYPE ${CARBON_METRIC_ESTIMATES_TOTAL} counter`);
    for (const [key, value] of this.estimates.entries()) {
      const [path, outcome] = key.split('|');
      lines.push(`${CARBON_METRIC_ESTIMATES_TOTAL}{path="${path}",outcome="${outcome}"} ${value}`);
    }

    lines.push(`# HELP ${CARBON_METRIC_FALLBACK_TOTAL} Total fallback results by reason.`);
    lines.push(`# TYPE ${CARBON_METRIC_FALLBACK_TOTAL} counter`);
    for (const [reason, value] of this.fallbacks.entries()) {
      lines.push(`${CARBON_METRIC_FALLBACK_TOTAL}{reason="${reason}"} ${value}`);
    }

    lines.push(`# HELP ${CARBON_METRIC_CACHE_EVENTS_TOTAL} Image result cache events.`);
    lines.push(`# TYPE ${CARBON_METRIC_CACHE_EVENTS_TOTAL} counter`);
    for (const [event, value] of this.cacheEvents.entries()) {
      lines.push(`${CARBON_METRIC_CACHE_EVENTS_TOTAL}{event="${event}"} ${value}`);
    }

    lines.push(`# HELP ${CARBON_METRIC_PROVIDER_CALLS_TOTAL} Logical provider calls by kind and outcome.`);
    lines.push(`# TYPE ${CARBON_METRIC_PROVIDER_CALLS_TOTAL} counter`);
    for (const [key, value] of this.providerCalls.entries()) {
      const [kind, outcome] = key.split('|');
      lines.push(`${CARBON_METRIC_PROVIDER_CALLS_TOTAL}{kind="${kind}",outcome="${outcome}"} ${value}`);
    }

    lines.push(`# HELP ${CARBON_METRIC_PROVIDER_RETRIES_TOTAL} Provider attempts repeated after a retryable failure.`);
    lines.push(`# TYPE ${CARBON_METRIC_PROVIDER_RETRIES_TOTAL} counter`);
    for (const [kind, value] of this.providerRetries.entries()) {
      lines.push(`${CARBON_METRIC_PROVIDER_RETRIES_TOTAL}{kind="${kind}"} ${value}`);
    }

    lines.push(`# HELP ${CARBON_METRIC_ESTIMATE_LATENCY_SECONDS} Estimate latency in seconds.`);
    lines.push(`# TYPE ${CARBON_METRIC_ESTIMATE_LATENCY_SECONDS} histogram`);
    for (const [key, value] of this.latencyBuckets.entries()) {
      const [path, bucket] = key.split('|');
      lines.push(`${CARBON_METRIC_ESTIMATE_LATENCY_SECONDS}_bucket{path="${path}",le="${bucket}"} ${value}`);
    }
    for (const [path, value] of this.latencySum.entries()) {
      lines.push(`${CARBON_METRIC_ESTIMATE_LATENCY_SECONDS}_sum{path="${path}"} ${value}`);
    }
    for (const [path, value] of this.latencyCount.entries()) {
      lines.push(`${CARBON_METRIC_ESTIMATE_LATENCY_SECONDS}_count{path="${path}"} ${value}`);
    }

    pushGauge(
      lines,
      CARBON_METRIC_RESULT_CACHE_ENTRIES,
      'Image results held in the cache.',
      gauges.resultCacheEntries,
    );
    pushGauge(
      lines,
      CARBON_METRIC_PROVIDER_QUEUE_DEPTH,
      'Callers waiting for a provider slot.',
      gauges.providerQueueDepth,
    );
    pushGauge(
      lines,
      CARBON_METRIC_EMISSION_FACTORS,
      'Ingredients in the emission factor table.',
      gauges.emissionFactors,
    );

    return `${lines.join('\n')}\n`;
  }
}

function pushGauge(lines: string[], name: string, help: string, value: number | undefined): void {
  if (value === undefined) {
    return;
  }

  lines.push(`# HELP ${name} ${help}`);
  lines.push(`# TYPE ${name} gauge`);
  lines.push(`${name} ${value}`);
}

function increment(counter: Map<string, number>, key: string): void {
  counter.set(key, (counter.get(key) ?? 0) + 1);
}

function sanitizeLabelValue(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/"/g, '\\"');
}
