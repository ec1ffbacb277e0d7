/**
 * ContentCache
 *
 * Three independent TTL stores in front of the index and the remote store:
 *
 *   posts  slug → post          (bounded by maxPosts)
 *   lists  list key → page      (bounded by maxLists)
 *   stats  one slot             (no bound)
 *
 * plus hit/miss counters, a smoothed read latency and a remote-call
 * counter. Every method is synchronous, so each call runs to completion
 * before any other task touches the cache. Nothing here throws.
 *
 * Invalidation is coarse: any post mutation clears every list and the
 * stats slot, since no list records which posts it contains.
 *
 * @packageDocumentation
 */

import type { Logger } from "@folio/protocol";
import { createTtlMap } from "./ttl-map.ts";

// ============================================================================
// Types
// ============================================================================

export type CacheConfig = {
  postTtlMs: number;
  listTtlMs: number;
  statsTtlMs: number;
  maxPosts: number;
  maxLists: number;
  /** Minimum time between expiry sweeps triggered by `set*` */
  cleanupIntervalMs: number;
};

export type ContentCacheDeps = {
  /** Monotonic clock in milliseconds (default: performance.now) */
  now?: () => number;
  logger?: Logger;
};

export type CachedList<TSummary> = {
  posts: TSummary[];
  total: number;
};

export type CacheMetrics = {
  hits: number;
  misses: number;
  totalRequests: number;
  /** hits / (hits + misses) * 100; 0 before the first lookup */
  hitRate: number;
  /** Exponential moving average of read latency; null before any sample */
  avgLatencyMs: number | null;
  /** Calls made to the remote file store */
  remoteCalls: number;
  evictions: number;
};

export type CacheStats = {
  cachedPosts: number;
  cachedLists: number;
  cachedStats: number;
};

export type ContentCache<TPost, TSummary, TStats> = {
  readonly config: CacheConfig;
  getPost: (slug: string) => TPost | undefined;
  setPost: (slug: string, post: TPost) => void;
  getList: (key: string) => CachedList<TSummary> | undefined;
  setList: (key: string, posts: TSummary[], total: number) => void;
  getStats: () => TStats | undefined;
  setStats: (stats: TStats) => void;
  /** Drop the post, every list and the stats slot */
  invalidatePost: (slug: string) => void;
  invalidateAll: () => void;
  recordHit: () => void;
  recordMiss: () => void;
  updateLatency: (sampleMs: number) => void;
  recordRemoteCall: () => void;
  getMetrics: () => CacheMetrics;
  getCacheStats: () => CacheStats;
  /** Sweep expired entries now; returns how many were removed */
  cleanupExpired: () => number;
};

// ============================================================================
// Constants
// ============================================================================

export const DEFAULT_CACHE_CONFIG: CacheConfig = {
  postTtlMs: 600_000,
  listTtlMs: 300_000,
  statsTtlMs: 900_000,
  maxPosts: 1000,
  maxLists: 50,
  cleanupIntervalMs: 300_000,
};

/** Weight of the newest latency sample */
export const LATENCY_SMOOTHING = 0.1;

const STATS_KEY = "stats";

// ============================================================================
// Factory
// ============================================================================

export const createContentCache = <TPost, TSummary = TPost, TStats = unknown>(
  config: Partial<CacheConfig> = {},
  deps: ContentCacheDeps = {}
): ContentCache<TPost, TSummary, TStats> => {
  const resolved: CacheConfig = { ...DEFAULT_CACHE_CONFIG, ...config };
  const { now = () => performance.now(), logger = console } = deps;

  for (const key of ["maxPosts", "maxLists"] as const) {
    if (!Number.isInteger(resolved[key]) || resolved[key] < 1) {
      throw new Error(`${key} must be a positive integer (got ${resolved[key]})`);
    }
  }

  const posts = createTtlMap<TPost>(resolved.maxPosts);
  const lists = createTtlMap<CachedList<TSummary>>(resolved.maxLists);
  const stats = createTtlMap<TStats>(1);

  const metrics: CacheMetrics = {
    hits: 0,
    misses: 0,
    totalRequests: 0,
    hitRate: 0,
    avgLatencyMs: null,
    remoteCalls: 0,
    evictions: 0,
  };
  let lastCleanup = now();

  const recordHit = (): void => {
    metrics.hits++;
    metrics.totalRequests++;
    metrics.hitRate = (metrics.hits / metrics.totalRequests) * 100;
  };

  const recordMiss = (): void => {
    metrics.misses++;
    metrics.totalRequests++;
    metrics.hitRate = (metrics.hits / metrics.totalRequests) * 100;
  };

  const cleanupExpired = (): number => {
    const at = now();
    const removed = posts.sweep(at) + lists.sweep(at) + stats.sweep(at);
    lastCleanup = at;
    if (removed > 0) logger.debug(`[content-cache] cleaned up ${removed} expired entries`);
    return removed;
  };

  const cleanupIfDue = (): void => {
    if (now() - lastCleanup > resolved.cleanupIntervalMs) cleanupExpired();
  };

  /** Lookup that records a hit or a miss */
  const lookup = <T>(kind: string, key: string, get: (at: number) => T | undefined): T | undefined => {
    const value = get(now());
    if (value === undefined) {
      logger.debug(`[content-cache] miss ${kind} ${key}`);
      recordMiss();
    } else {
      logger.debug(`[content-cache] hit ${kind} ${key}`);
      recordHit();
    }
    return value;
  };

  const noteEvictions = (kind: string, count: number): void => {
    if (count === 0) return;
    metrics.evictions += count;
    logger.debug(`[content-cache] evicted ${count} oldest ${kind} entries`);
  };

  return {
    config: resolved,

    getPost: (slug) => lookup("post", slug, (at) => posts.get(slug, at)),

    setPost(slug, post) {
      cleanupIfDue();
      noteEvictions("post", posts.set(slug, post, now(), resolved.postTtlMs));
    },

    getList: (key) => lookup("list", key, (at) => lists.get(key, at)),

    setList(key, items, total) {
      cleanupIfDue();
      noteEvictions("list", lists.set(key, { posts: items, total }, now(), resolved.listTtlMs));
    },

    getStats: () => lookup("stats", STATS_KEY, (at) => stats.get(STATS_KEY, at)),

    setStats(value) {
      cleanupIfDue();
      stats.set(STATS_KEY, value, now(), resolved.statsTtlMs);
    },

    invalidatePost(slug) {
      posts.delete(slug);
      lists.clear();
      stats.clear();
      logger.debug(`[content-cache] invalidated post ${slug}`);
    },

    invalidateAll() {
      posts.clear();
      lists.clear();
      stats.clear();
      logger.info("[content-cache] invalidated all entries");
    },

    recordHit,
    recordMiss,

    updateLatency(sampleMs) {
      metrics.avgLatencyMs =
        metrics.avgLatencyMs === null
          ? sampleMs
          : (1 - LATENCY_SMOOTHING) * metrics.avgLatencyMs + LATENCY_SMOOTHING * sampleMs;
    },

    recordRemoteCall() {
      metrics.remoteCalls++;
    },

    getMetrics: () => ({ ...metrics }),

    getCacheStats: () => ({
      cachedPosts: posts.size(),
      cachedLists: lists.size(),
      cachedStats: stats.size(),
    }),

    cleanupExpired,
  };
};
