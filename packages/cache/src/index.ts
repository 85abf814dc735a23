export { LruCache } from './lru-cache.js';
export type { LruCacheOptions, LruCacheEntry, LruCacheStats, CacheMetricsSink } from './lru-cache.js';
export { SingleFlight } from './single-flight.js';
export { normalizeKey } from './normalize.js';
