import type { ConfigService } from '@nestjs/config';
import { ENV_DEFAULTS } from '../../../../../common/config/env.validation';

export interface EstimateSettings {
  textModel: string;
  visionModel: string;
  textTimeoutMs: number;
  visionTimeoutMs: number;
  retryMax: number;
  retryBaseBackoffMs: number;
  retryMaxBackoffMs: number;
}

/** Reads the validated env; bounds and parsing live in `validateEnv`. */
export function resolveEstimateSettings(configService: ConfigService): EstimateSettings {
  return {
    textModel: configService.get<string>('OPENAI_MODEL') ?? ENV_DEFAULTS.OPENAI_MODEL,
    visionModel:
      configService.get<string>('OPENAI_VISION_MODEL') ?? ENV_DEFAULTS.OPENAI_VISION_MODEL,
    textTimeoutMs:
      configService.get<number>('OPENAI_TEXT_TIMEOUT_MS') ?? ENV_DEFAULTS.OPENAI_TEXT_TIMEOUT_MS,
    visionTimeoutMs:
      configService.get<number>('OPENAI_VISION_TIMEOUT_MS') ??
      ENV_DEFAULTS.OPENAI_VISION_TIMEOUT_MS,
    retryMax: configService.get<number>('PROVIDER_RETRY_MAX') ?? ENV_DEFAULTS.PROVIDER_RETRY_MAX,
    retryBaseBackoffMs:
      configService.get<number>('PROVIDER_RETRY_BASE_BACKOFF_MS') ??
      ENV_DEFAULTS.PROVIDER_RETRY_BASE_BACKOFF_MS,
    retryMaxBackoffMs:
      configService.get<number>('PROVIDER_RETRY_MAX_BACKOFF_MS') ??
      ENV_DEFAULTS.PROVIDER_RETRY_MAX_BACKOFF_MS,
  };
}
