import { sha256Hex } from '@/common/utils/hash.utils';
import { buildFallbackResult } from '@/modules/carbon/domain/estimate-result';
import { InMemoryResultCacheAdapter } from '@/modules/carbon/infrastructure/adapters/cache';

describe('InMemoryResultCacheAdapter', () => {
  it('stores and returns results by hash', () => {
    const cache = new InMemoryResultCacheAdapter();
    const result = buildFallbackResult('Soup', 'Provider HTTP 500');
    const hash = sha256Hex(Buffer.from('image-a'));

    expect(cache.get(hash)).toBeUndefined();

    cache.put(hash, result);

    expect(cache.get(hash)).toBe(result);
    expect(cache.size).toBe(1);
  });

  it('keys identical bytes to the same hash', () => {
    expect(sha256Hex(Buffer.from('image-a'))).toBe(sha256Hex(new Uint8Array(Buffer.from('image-a'))));
    expect(sha256Hex(Buffer.from('image-a'))).not.toBe(sha256Hex(Buffer.from('image-b')));
    expect(sha256Hex('')).toBe('e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855');
  });
});
