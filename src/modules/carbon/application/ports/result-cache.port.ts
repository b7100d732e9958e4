import type { EstimateResult } from '../../domain/estimate-result';

export interface ResultCachePort {
  get(hash: string): EstimateResult | undefined;
  put(hash: string, result: EstimateResult): void;
  readonly size: number;
}
