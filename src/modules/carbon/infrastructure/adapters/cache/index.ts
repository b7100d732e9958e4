export { InMemoryResultCacheAdapter } from './in-memory-result-cache.adapter';
