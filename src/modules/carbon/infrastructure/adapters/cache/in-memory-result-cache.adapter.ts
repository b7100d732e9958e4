import { Injectable } from '@nestjs/common';
import { createLogger } from '../../../../../common/utils/logger';
import type { ResultCachePort } from '../../../application/ports/result-cache.port';
import type { EstimateResult } from '../../../domain/estimate-result';

/**
 * Image results keyed by content hash. Lives for the process lifetime and
 * never evicts.
 */
@Injectable()
export class InMemoryResultCacheAdapter implements ResultCachePort {
  private readonly logger = createLogger(InMemoryResultCacheAdapter.name);
  private readonly entries = new Map<string, EstimateResult>();

  get size(): number {
    return this.entries.size;
  }

  get(hash: string): EstimateResult | undefined {
    return this.entries.get(hash);
  }

  put(hash: string, result: EstimateResult): void {
    this.entries.set(hash, result);
    this.logger.cache('result_cache_store', {
      event: 'result_cache_store',
      hash_prefix: hash.slice(0, 12),
      entries: this.entries.size,
    });
  }
}
