/**
 * @folio/content-cache
 *
 * In-process TTL cache with capacity eviction and hit-rate metrics.
 */

export {
  type CacheConfig,
  type CachedList,
  type CacheMetrics,
  type CacheStats,
  type ContentCache,
  type ContentCacheDeps,
  createContentCache,
  DEFAULT_CACHE_CONFIG,
  LATENCY_SMOOTHING,
} from "./content-cache.ts";
export { ALL_POSTS_KEY, buildListCacheKey, type ListFilters } from "./keys.ts";
export { type CacheEntry, createTtlMap, type TtlMap } from "./ttl-map.ts";
