import { RetryExhaustedError } from '../../../../common/utils/retry.utils';
import { ProviderHttpError, ProviderNetworkError, ProviderResponseParseError } from './provider.errors';

export type ProviderFailureReason =
  | 'timeout'
  | 'network'
  | 'http_429'
  | 'http_5xx'
  | 'http_other'
  | 'parse_error'
  | 'unknown';

export function isRetryableHttpStatus(status: number): boolean {
  return status === 429 || (status >= 500 && status <= 599);
}

/** 429, any 5xx and timeouts are retried; everything else is final. */
export function isRetryableProviderFailure(error: unknown): boolean {
  if (error instanceof ProviderHttpError) {
    return isRetryableHttpStatus(error.status);
  }

  return error instanceof ProviderNetworkError && error.code === 'timeout';
}

export function unwrapProviderFailure(error: unknown): unknown {
  return error instanceof RetryExhaustedError ? error.lastError : error;
}

export function classifyProviderFailure(error: unknown): ProviderFailureReason {
  const failure = unwrapProviderFailure(error);

  if (failure instanceof ProviderResponseParseError) {
    return 'parse_error';
  }

  if (failure instanceof ProviderNetworkError) {
    return failure.code;
  }

  if (failure instanceof ProviderHttpError) {
    if (failure.status === 429) {
      return 'http_429';
    }
    if (failure.status >= 500 && failure.status <= 599) {
      return 'http_5xx';
    }
    return 'http_other';
  }

  return 'unknown';
}
