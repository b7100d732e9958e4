import { Controller, Get, Header, Inject } from '@nestjs/common';
import type { ResultCachePort } from '../application/ports/result-cache.port';
import { EMISSION_FACTOR_TABLE, RESULT_CACHE_PORT } from '../application/ports/tokens';
import { EmissionFactorTable } from '../domain/emission-factors';
import { PrometheusMetricsAdapter } from '../infrastructure/adapters/metrics';
import { ProviderRateLimiterAdapter } from '../infrastructure/adapters/rate-limit';

@Controller('internal')
export class MetricsController {
  constructor(
    private readonly metrics: PrometheusMetricsAdapter,
    private readonly rateLimiter: ProviderRateLimiterAdapter,
    @Inject(RESULT_CACHE_PORT) private readonly resultCache: ResultCachePort,
    @Inject(EMISSION_FACTOR_TABLE) private readonly emissionFactors: EmissionFactorTable,
  ) {}

  @Get('metrics')
  @Header('Content-Type', 'text/plain; version=0.0.4; charset=utf-8')
  render(): string {
    return this.metrics.renderPrometheus({
      resultCacheEntries: this.resultCache.size,
      providerQueueDepth: this.rateLimiter.pendingCount,
      emissionFactors: this.emissionFactors.size,
    });
  }
}
