import {
  RATE_LIMIT_NOTICE,
  UNKNOWN_ERROR_MESSAGE,
} from '../../../../../common/constants/error-messages.constants';
import { RetryExhaustedError } from '../../../../../common/utils/retry.utils';
import { ProviderHttpError, unwrapProviderFailure } from '../../../domain/errors';

/**
 * Text placed in the `error` field of a fallback result.
 * HTTP failures are reported under `prefix`; exhausted retries keep the
 * attempt count.
 */
export function describeProviderFailure(error: unknown, prefix: string): string {
  const message = describeSingleFailure(unwrapProviderFailure(error), prefix);

  if (error instanceof RetryExhaustedError) {
    return `${message} (gave up after ${error.attempts} attempts)`;
  }

  return message;
}

function describeSingleFailure(failure: unknown, prefix: string): string {
  if (failure instanceof ProviderHttpError) {
    const message = `${prefix} HTTP ${failure.status}`;
    return failure.status === 429 ? `${message}: ${RATE_LIMIT_NOTICE}` : message;
  }

  if (failure instanceof Error && failure.message.trim().length > 0) {
    return failure.message;
  }

  return UNKNOWN_ERROR_MESSAGE;
}
