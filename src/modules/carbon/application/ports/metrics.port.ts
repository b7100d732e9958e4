import type { CompletionKind } from './completion-provider.port';

export type EstimatePath = 'dish' | 'image';
export type EstimateOutcome = 'success' | 'fallback' | 'cache_hit';

export interface MetricsPort {
  incrementEstimate(input: { path: EstimatePath; outcome: EstimateOutcome }): void;

  observeEstimateLatency(input: { path: EstimatePath; seconds: number }): void;

  incrementFallback(reason: string): void;

  incrementCacheEvent(event: 'hit' | 'miss' | 'store'): void;

  incrementProviderCall(input: { kind: CompletionKind; outcome: 'succeeded' | 'failed' }): void;

  incrementProviderRetry(kind: CompletionKind): void;
}
