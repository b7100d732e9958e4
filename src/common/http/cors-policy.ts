import type { CorsOptions } from '@nestjs/common/interfaces/external/cors-options.interface';
import type { AppEnv } from '../config/env.validation';
import { REQUEST_ID_HEADER } from '../middleware/request-id.middleware';
import { createLogger } from '../utils/logger';

type CorsOriginCallback = (error: Error | null, allow?: boolean) => void;

const corsLogger = createLogger('CorsPolicy');

export function normalizeOrigin(origin: string): string {
  const trimmed = origin.trim();
  try {
    const parsed = new URL(trimmed);
    return `${parsed.protocol}//${parsed.host}`.toLowerCase();
  } catch {
    return trimmed.replace(/\/+$/, '').toLowerCase();
  }
}

/**
 * Browsers outside production may call from anywhere; production only
 * accepts the configured origins. Requests without an Origin header
 * (curl, server-to-server) are always let through.
 */
export function buildCorsOptions(env: Pick<AppEnv, 'NODE_ENV' | 'ALLOWED_ORIGINS'>): CorsOptions {
  const strict = env.NODE_ENV === 'production';
  const allowed = new Set(env.ALLOWED_ORIGINS.map(normalizeOrigin));

  const origin = (requestOrigin: string | undefined, callback: CorsOriginCallback): void => {
    if (!strict || !requestOrigin || allowed.has(normalizeOrigin(requestOrigin))) {
      callback(null, true);
      return;
    }

    corsLogger.warn('cors_origin_rejected', {
      event: 'cors_origin_rejected',
      origin: requestOrigin,
      allowed_origins_count: allowed.size,
    });
    callback(new Error('Origin not allowed by CORS'));
  };

  return {
    origin,
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', REQUEST_ID_HEADER],
    exposedHeaders: [REQUEST_ID_HEADER],
  };
}
