import { RetryExhaustedError } from '@/common/utils/retry.utils';
import { describeProviderFailure } from '@/modules/carbon/application/use-cases/estimate-carbon';
import { ProviderHttpError, ProviderNetworkError } from '@/modules/carbon/domain/errors';

describe('describeProviderFailure', () => {
  it('prefixes HTTP failures', () => {
    expect(describeProviderFailure(new ProviderHttpError(502), 'Provider')).toBe('Provider HTTP 502');
    expect(describeProviderFailure(new ProviderHttpError(502), 'Vision provider')).toBe(
      'Vision provider HTTP 502',
    );
  });

  it('adds the rate limit notice to 429', () => {
    expect(describeProviderFailure(new ProviderHttpError(429), 'Vision provider')).toBe(
      'Vision provider HTTP 429: rate limit reached, please wait a moment and try again',
    );
  });

  it('keeps the attempt count of exhausted retries', () => {
    const error = new RetryExhaustedError(6, new ProviderNetworkError('timeout', 45000));

    expect(describeProviderFailure(error, 'Provider')).toBe(
      'Provider request timed out (gave up after 6 attempts)',
    );
  });

  it('falls back to a generic message', () => {
    expect(describeProviderFailure(undefined, 'Provider')).toBe('Unknown error');
  });
});
