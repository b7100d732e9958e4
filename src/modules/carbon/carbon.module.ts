import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { MulterModule } from '@nestjs/platform-express';
import { ENV_DEFAULTS } from '../../common/config/env.validation';
import {
  CLOCK_PORT,
  COMPLETION_PROVIDER_PORT,
  EMISSION_FACTOR_TABLE,
  METRICS_PORT,
  PROVIDER_RATE_LIMITER_PORT,
  RESULT_CACHE_PORT,
} from './application/ports/tokens';
import { EstimateCarbonUseCase } from './application/use-cases/estimate-carbon';
import { EstimateController } from './controllers/estimate.controller';
import { MetricsController } from './controllers/metrics.controller';
import { EmissionFactorTable } from './domain/emission-factors';
import { InMemoryResultCacheAdapter } from './infrastructure/adapters/cache';
import { PrometheusMetricsAdapter } from './infrastructure/adapters/metrics';
import { OpenAiCompletionAdapter } from './infrastructure/adapters/openai';
import { ProviderRateLimiterAdapter } from './infrastructure/adapters/rate-limit';
import { SystemClock } from './infrastructure/adapters/shared';

@Module({
  imports: [
    MulterModule.registerAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => ({
        limits: {
          fileSize:
            configService.get<number>('UPLOAD_MAX_BYTES') ?? ENV_DEFAULTS.UPLOAD_MAX_BYTES,
          files: 1,
        },
      }),
    }),
  ],
  controllers: [EstimateController, MetricsController],
  providers: [
    EstimateCarbonUseCase,
    OpenAiCompletionAdapter,
    ProviderRateLimiterAdapter,
    InMemoryResultCacheAdapter,
    PrometheusMetricsAdapter,
    SystemClock,
    {
      provide: EMISSION_FACTOR_TABLE,
      useFactory: () => new EmissionFactorTable(),
    },
    {
      provide: COMPLETION_PROVIDER_PORT,
      useExisting: OpenAiCompletionAdapter,
    },
    {
      provide: PROVIDER_RATE_LIMITER_PORT,
      useExisting: ProviderRateLimiterAdapter,
    },
    {
      provide: RESULT_CACHE_PORT,
      useExisting: InMemoryResultCacheAdapter,
    },
    {
      provide: METRICS_PORT,
      useExisting: PrometheusMetricsAdapter,
    },
    {
      provide: CLOCK_PORT,
      useExisting: SystemClock,
    },
  ],
})
export class CarbonModule {}
