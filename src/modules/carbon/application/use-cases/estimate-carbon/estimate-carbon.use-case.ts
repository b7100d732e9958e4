import { Inject, Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  BLANK_DISH_MESSAGE,
  EMPTY_DISH_NAME_MESSAGE,
  EMPTY_IMAGE_MESSAGE,
  MISSING_API_KEY_MESSAGE,
} from '../../../../../common/constants/error-messages.constants';
import { sha256Hex } from '../../../../../common/utils/hash.utils';
import { createLogger } from '../../../../../common/utils/logger';
import { withRetry } from '../../../../../common/utils/retry.utils';
import type { EmissionFactorTable } from '../../../domain/emission-factors';
import { classifyProviderFailure, isRetryableProviderFailure } from '../../../domain/errors';
import {
  buildEstimateResult,
  buildFallbackResult,
  isFallbackResult,
  type EstimateResult,
} from '../../../domain/estimate-result';
import { extractDishName, extractIngredientList } from '../../../domain/response-extractor';
import type { ClockPort } from '../../ports/clock.port';
import type { CompletionProviderPort, CompletionRequest } from '../../ports/completion-provider.port';
import type { EstimatePath, MetricsPort } from '../../ports/metrics.port';
import type { ProviderRateLimiterPort } from '../../ports/rate-limiter.port';
import type { ResultCachePort } from '../../ports/result-cache.port';
import {
  CLOCK_PORT,
  COMPLETION_PROVIDER_PORT,
  EMISSION_FACTOR_TABLE,
  METRICS_PORT,
  PROVIDER_RATE_LIMITER_PORT,
  RESULT_CACHE_PORT,
} from '../../ports/tokens';
import {
  PROVIDER_MESSAGE_PREFIX,
  TEXT_MAX_TOKENS,
  VISION_MAX_TOKENS,
  VISION_PROVIDER_MESSAGE_PREFIX,
} from './constants';
import { describeProviderFailure } from './describe-failure';
import { resolveEstimateSettings, type EstimateSettings } from './estimate-settings';
import { buildDishIdentificationContent, buildIngredientPrompt } from './prompt-builder';

/**
 * Turns a dish name or a photo into a carbon estimate.
 * Never rejects: every failure comes back as a fallback result.
 */
@Injectable()
export class EstimateCarbonUseCase {
  private readonly logger = createLogger(EstimateCarbonUseCase.name);
  private readonly settings: EstimateSettings;

  constructor(
    configService: ConfigService,
    @Inject(COMPLETION_PROVIDER_PORT)
    private readonly completionProvider: CompletionProviderPort,
    @Inject(PROVIDER_RATE_LIMITER_PORT)
    private readonly rateLimiter: ProviderRateLimiterPort,
    @Inject(RESULT_CACHE_PORT)
    private readonly resultCache: ResultCachePort,
    @Inject(METRICS_PORT)
    private readonly metricsPort: MetricsPort,
    @Inject(CLOCK_PORT)
    private readonly clock: ClockPort,
    @Inject(EMISSION_FACTOR_TABLE)
    private readonly emissionFactors: EmissionFactorTable,
  ) {
    this.settings = resolveEstimateSettings(configService);
  }

  async estimateFromDishName(dishName: string): Promise<EstimateResult> {
    const startedAt = this.clock.now();
    const result = await this.runDishEstimate(dishName);
    this.recordOutcome('dish', result, startedAt);
    return result;
  }

  async estimateFromImage(bytes: Uint8Array, mimeType?: string): Promise<EstimateResult> {
    const startedAt = this.clock.now();

    if (bytes.length === 0) {
      const result = this.fallback('', EMPTY_IMAGE_MESSAGE, 'empty_image');
      this.recordOutcome('image', result, startedAt);
      return result;
    }

    const hash = sha256Hex(bytes);
    const cached = this.resultCache.get(hash);
    if (cached) {
      this.metricsPort.incrementCacheEvent('hit');
      this.logger.cache('image_estimate_cache_hit', {
        event: 'image_estimate_cache_hit',
        hash_prefix: hash.slice(0, 12),
        dish: cached.dish,
      });
      this.recordOutcome('image', cached, startedAt, true);
      return cached;
    }

    this.metricsPort.incrementCacheEvent('miss');

    const result = await this.runImageEstimate(bytes, mimeType);
    if (!isFallbackResult(result)) {
      this.resultCache.put(hash, result);
      this.metricsPort.incrementCacheEvent('store');
    }

    this.recordOutcome('image', result, startedAt);
    return result;
  }

  private async runDishEstimate(dishName: string): Promise<EstimateResult> {
    const dish = dishName.trim();
    if (dish.length === 0) {
      return this.fallback('', BLANK_DISH_MESSAGE, 'blank_dish');
    }

    if (!this.completionProvider.isConfigured()) {
      return this.fallback(dish, MISSING_API_KEY_MESSAGE, 'missing_api_key');
    }

    try {
      const body = await this.callProvider({
        kind: 'text',
        model: this.settings.textModel,
        content: buildIngredientPrompt(dish),
        maxTokens: TEXT_MAX_TOKENS,
        timeoutMs: this.settings.textTimeoutMs,
      });

      return buildEstimateResult(dish, extractIngredientList(body), this.emissionFactors);
    } catch (error: unknown) {
      return this.fallback(
        dish,
        describeProviderFailure(error, PROVIDER_MESSAGE_PREFIX),
        classifyProviderFailure(error),
      );
    }
  }

  private async runImageEstimate(bytes: Uint8Array, mimeType: string | undefined): Promise<EstimateResult> {
    if (!this.completionProvider.isConfigured()) {
      return this.fallback('', MISSING_API_KEY_MESSAGE, 'missing_api_key');
    }

    let dishName: string;
    try {
      const body = await this.callProvider({
        kind: 'vision',
        model: this.settings.visionModel,
        content: buildDishIdentificationContent(bytes, mimeType),
        maxTokens: VISION_MAX_TOKENS,
        timeoutMs: this.settings.visionTimeoutMs,
      });
      dishName = extractDishName(body);
    } catch (error: unknown) {
      return this.fallback(
        '',
        describeProviderFailure(error, VISION_PROVIDER_MESSAGE_PREFIX),
        classifyProviderFailure(error),
      );
    }

    if (dishName.length === 0) {
      return this.fallback('', EMPTY_DISH_NAME_MESSAGE, 'empty_dish_name');
    }

    this.logger.provider('dish_identified', {
      event: 'dish_identified',
      dish: dishName,
    });

    return this.runDishEstimate(dishName);
  }

  /** One logical provider call: a single rate-limit slot, then retries. */
  private async callProvider(request: CompletionRequest): Promise<string> {
    await this.rateLimiter.acquireSlot();

    try {
      const body = await withRetry({
        maxAttempts: this.settings.retryMax + 1,
        baseBackoffMs: this.settings.retryBaseBackoffMs,
        maxBackoffMs: this.settings.retryMaxBackoffMs,
        fn: () => this.completionProvider.complete(request),
        shouldRetry: isRetryableProviderFailure,
        onAttemptFailed: (error, attempt, retrying) => {
          if (retrying) {
            this.metricsPort.incrementProviderRetry(request.kind);
          }

          this.logger.warn('provider_attempt_failed', {
            event: 'provider_attempt_failed',
            kind: request.kind,
            attempt,
            retrying,
            reason: classifyProviderFailure(error),
          });
        },
        sleep: (ms) => this.clock.sleep(ms),
      });

      this.metricsPort.incrementProviderCall({ kind: request.kind, outcome: 'succeeded' });
      return body;
    } catch (error: unknown) {
      this.metricsPort.incrementProviderCall({ kind: request.kind, outcome: 'failed' });
      throw error;
    }
  }

  private fallback(dish: string, message: string, reason: string): EstimateResult {
    this.metricsPort.incrementFallback(reason);
    this.logger.warn('estimate_fallback', {
      event: 'estimate_fallback',
      dish,
      reason,
      error: message,
    });

    return buildFallbackResult(dish, message);
  }

  private recordOutcome(
    path: EstimatePath,
    result: EstimateResult,
    startedAt: number,
    fromCache = false,
  ): void {
    const outcome = fromCache ? 'cache_hit' : isFallbackResult(result) ? 'fallback' : 'success';
    const latencyMs = Math.max(0, this.clock.now() - startedAt);

    this.metricsPort.incrementEstimate({ path, outcome });
    this.metricsPort.observeEstimateLatency({ path, seconds: latencyMs / 1000 });
    this.logger.info('estimate_completed', {
      event: 'estimate_completed',
      path,
      outcome,
      dish: result.dish,
      estimated_carbon_kg: result.estimatedCarbonKg,
      ingredients: result.ingredients.length,
      latency_ms: latencyMs,
    });
  }
}
