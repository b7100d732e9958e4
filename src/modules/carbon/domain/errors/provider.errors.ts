/**
 * Failures of one outbound call to the completion provider.
 * The retry policy and the fallback mapping both classify on these types.
 */

export class ProviderHttpError extends Error {
  constructor(
    public readonly status: number,
    public readonly body: string = '',
  ) {
    super(`Provider HTTP ${status}`);
    this.name = 'ProviderHttpError';
  }
}

export class ProviderNetworkError extends Error {
  constructor(
    public readonly code: 'timeout' | 'network',
    public readonly timeoutMs?: number,
  ) {
    super(code === 'timeout' ? 'Provider request timed out' : 'Provider request failed: network error');
    this.name = 'ProviderNetworkError';
  }
}

export class ProviderResponseParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ProviderResponseParseError';
  }
}
