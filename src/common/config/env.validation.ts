import { resolveBooleanFlag } from '../utils/config.utils';

export interface AppEnv {
  NODE_ENV: 'development' | 'test' | 'production';
  PORT: number;
  LOG_LEVEL: 'debug' | 'log' | 'info' | 'warn' | 'error';
  ALLOWED_ORIGINS: string[];
  OPENAI_BASE_URL: string;
  OPENAI_API_KEY?: string;
  OPENAI_MODEL: string;
  OPENAI_VISION_MODEL: string;
  OPENAI_TEXT_TIMEOUT_MS: number;
  OPENAI_VISION_TIMEOUT_MS: number;
  PROVIDER_RATE_LIMIT_ENABLED: boolean;
  PROVIDER_RATE_LIMIT_MIN_INTERVAL_MS: number;
  PROVIDER_RETRY_MAX: number;
  PROVIDER_RETRY_BASE_BACKOFF_MS: number;
  PROVIDER_RETRY_MAX_BACKOFF_MS: number;
  UPLOAD_MAX_BYTES: number;
}

/** Single source of the settings defaults; adapters fall back to these too. */
export const ENV_DEFAULTS = {
  PORT: 8080,
  OPENAI_BASE_URL: 'https://api.openai.com/v1',
  OPENAI_MODEL: 'gpt-4o-mini',
  OPENAI_VISION_MODEL: 'gpt-4o',
  OPENAI_TEXT_TIMEOUT_MS: 45_000,
  OPENAI_VISION_TIMEOUT_MS: 60_000,
  PROVIDER_RATE_LIMIT_ENABLED: true,
  PROVIDER_RATE_LIMIT_MIN_INTERVAL_MS: 20_000,
  PROVIDER_RETRY_MAX: 5,
  PROVIDER_RETRY_BASE_BACKOFF_MS: 5_000,
  PROVIDER_RETRY_MAX_BACKOFF_MS: 120_000,
  UPLOAD_MAX_BYTES: 10 * 1024 * 1024,
} as const satisfies Partial<AppEnv>;

function parseNumber(value: unknown, fallback: number): number {
  if (value === undefined || value === null || value === '') {
    return fallback;
  }

  const parsed = Number(value);
  if (Number.isNaN(parsed)) {
    throw new Error(`Invalid number value: ${String(value)}`);
  }

  return parsed;
}

function parseOrigins(value: unknown): string[] {
  if (typeof value !== 'string' || value.trim() === '') {
    return [];
  }

  return value
    .split(',')
    .map((origin) => origin.trim())
    .filter((origin) => origin.length > 0);
}

function parseBoolean(value: unknown, fallback: boolean): boolean {
  if (typeof value === 'boolean' || typeof value === 'string') {
    return resolveBooleanFlag(value, fallback);
  }

  return fallback;
}

function parseNodeEnv(value: unknown): AppEnv['NODE_ENV'] {
  if (value === 'production' || value === 'test') {
    return value;
  }

  return 'development';
}

function parseLogLevel(value: unknown): AppEnv['LOG_LEVEL'] {
  if (
    value === 'debug' ||
    value === 'warn' ||
    value === 'error' ||
    value === 'info' ||
    value === 'log'
  ) {
    return value;
  }

  return 'log';
}

function parseBaseUrl(value: unknown): string {
  const raw = String(value ?? '').trim();
  if (raw.length === 0) {
    return ENV_DEFAULTS.OPENAI_BASE_URL;
  }

  let parsed: URL;
  try {
    parsed = new URL(raw);
  } catch {
    throw new Error(`Invalid OPENAI_BASE_URL: ${raw}`);
  }

  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new Error(`Invalid OPENAI_BASE_URL: ${raw}`);
  }

  return raw.replace(/\/+$/, '');
}

export function validateEnv(config: Record<string, unknown>): AppEnv {
  const NODE_ENV = parseNodeEnv(config.NODE_ENV);
  const ALLOWED_ORIGINS = parseOrigins(config.ALLOWED_ORIGINS);

  if (NODE_ENV === 'production' && ALLOWED_ORIGINS.length === 0) {
    throw new Error('ALLOWED_ORIGINS is required in production');
  }

  const PROVIDER_RETRY_BASE_BACKOFF_MS = Math.max(
    0,
    parseNumber(config.PROVIDER_RETRY_BASE_BACKOFF_MS, ENV_DEFAULTS.PROVIDER_RETRY_BASE_BACKOFF_MS),
  );

  return {
    NODE_ENV,
    PORT: parseNumber(config.PORT, ENV_DEFAULTS.PORT),
    LOG_LEVEL: parseLogLevel(config.LOG_LEVEL),
    ALLOWED_ORIGINS,
    OPENAI_BASE_URL: parseBaseUrl(config.OPENAI_BASE_URL),
    OPENAI_API_KEY: String(config.OPENAI_API_KEY ?? '').trim() || undefined,
    OPENAI_MODEL: String(config.OPENAI_MODEL ?? '').trim() || ENV_DEFAULTS.OPENAI_MODEL,
    OPENAI_VISION_MODEL:
      String(config.OPENAI_VISION_MODEL ?? '').trim() || ENV_DEFAULTS.OPENAI_VISION_MODEL,
    OPENAI_TEXT_TIMEOUT_MS: Math.max(
      1000,
      parseNumber(config.OPENAI_TEXT_TIMEOUT_MS, ENV_DEFAULTS.OPENAI_TEXT_TIMEOUT_MS),
    ),
    OPENAI_VISION_TIMEOUT_MS: Math.max(
      1000,
      parseNumber(config.OPENAI_VISION_TIMEOUT_MS, ENV_DEFAULTS.OPENAI_VISION_TIMEOUT_MS),
    ),
    PROVIDER_RATE_LIMIT_ENABLED: parseBoolean(
      config.PROVIDER_RATE_LIMIT_ENABLED,
      ENV_DEFAULTS.PROVIDER_RATE_LIMIT_ENABLED,
    ),
    PROVIDER_RATE_LIMIT_MIN_INTERVAL_MS: Math.max(
      0,
      parseNumber(
        config.PROVIDER_RATE_LIMIT_MIN_INTERVAL_MS,
        ENV_DEFAULTS.PROVIDER_RATE_LIMIT_MIN_INTERVAL_MS,
      ),
    ),
    PROVIDER_RETRY_MAX: Math.max(
      0,
      Math.floor(parseNumber(config.PROVIDER_RETRY_MAX, ENV_DEFAULTS.PROVIDER_RETRY_MAX)),
    ),
    PROVIDER_RETRY_BASE_BACKOFF_MS,
    PROVIDER_RETRY_MAX_BACKOFF_MS: Math.max(
      PROVIDER_RETRY_BASE_BACKOFF_MS,
      parseNumber(config.PROVIDER_RETRY_MAX_BACKOFF_MS, ENV_DEFAULTS.PROVIDER_RETRY_MAX_BACKOFF_MS),
    ),
    UPLOAD_MAX_BYTES: Math.max(
      1,
      parseNumber(config.UPLOAD_MAX_BYTES, ENV_DEFAULTS.UPLOAD_MAX_BYTES),
    ),
  };
}
