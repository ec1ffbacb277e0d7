/**
 * Folio - Configuration
 *
 * Environment-driven loaders. Each takes the environment as a record so
 * tests can pass a literal; unset or non-numeric values fall back to the
 * defaults.
 */

import type { CacheConfig } from "@folio/content-cache";
import { DEFAULT_API_BASE_URL, DEFAULT_CONTENT_BASE_URL } from "@folio/dropbox";
import type { RetryPolicy } from "@folio/post-store";
import { DEFAULT_STORAGE_ROOT } from "@folio/protocol";

export type Env = Record<string, string | undefined>;

const readInt = (env: Env, name: string, fallback: number): number => {
  const value = Number.parseInt(env[name] ?? "", 10);
  return Number.isNaN(value) ? fallback : value;
};

// ============================================================================
// Dropbox Config
// ============================================================================

export type DropboxConfig = {
  accessToken: string;
  apiBaseUrl: string;
  contentBaseUrl: string;
};

/**
 * @throws Error when DROPBOX_ACCESS_TOKEN is not set
 */
export const loadDropboxConfig = (env: Env = process.env): DropboxConfig => {
  const accessToken = env.DROPBOX_ACCESS_TOKEN;
  if (!accessToken) {
    throw new Error("DROPBOX_ACCESS_TOKEN is not set");
  }
  return {
    accessToken,
    apiBaseUrl: env.DROPBOX_API_URL ?? DEFAULT_API_BASE_URL,
    contentBaseUrl: env.DROPBOX_CONTENT_URL ?? DEFAULT_CONTENT_BASE_URL,
  };
};

// ============================================================================
// Storage Config
// ============================================================================

export type StorageConfig = {
  root: string;
};

export const loadStorageConfig = (env: Env = process.env): StorageConfig => ({
  root: env.FOLIO_STORAGE_ROOT ?? DEFAULT_STORAGE_ROOT,
});

// ============================================================================
// Rate Limit Config
// ============================================================================

export type RateLimitConfig = {
  maxRequests: number;
  windowMs: number;
};

export const loadRateLimitConfig = (env: Env = process.env): RateLimitConfig => ({
  maxRequests: readInt(env, "FOLIO_RATE_LIMIT_MAX", 450),
  windowMs: readInt(env, "FOLIO_RATE_LIMIT_WINDOW_MS", 60_000),
});

// ============================================================================
// Retry Config
// ============================================================================

export const loadRetryConfig = (env: Env = process.env): RetryPolicy => ({
  maxAttempts: readInt(env, "FOLIO_RETRY_ATTEMPTS", 3),
  baseDelayMs: readInt(env, "FOLIO_RETRY_BASE_DELAY_MS", 200),
  maxDelayMs: readInt(env, "FOLIO_RETRY_MAX_DELAY_MS", 2000),
});

// ============================================================================
// Cache Config
// ============================================================================

export const loadCacheConfig = (env: Env = process.env): CacheConfig => ({
  postTtlMs: readInt(env, "FOLIO_CACHE_POST_TTL_MS", 600_000), // 10 minutes
  listTtlMs: readInt(env, "FOLIO_CACHE_LIST_TTL_MS", 300_000), // 5 minutes
  statsTtlMs: readInt(env, "FOLIO_CACHE_STATS_TTL_MS", 900_000), // 15 minutes
  maxPosts: readInt(env, "FOLIO_CACHE_MAX_POSTS", 1000),
  maxLists: readInt(env, "FOLIO_CACHE_MAX_LISTS", 50),
  cleanupIntervalMs: readInt(env, "FOLIO_CACHE_CLEANUP_INTERVAL_MS", 300_000),
});

// ============================================================================
// App Config (combined)
// ============================================================================

export type FolioConfig = {
  dropbox: DropboxConfig;
  storage: StorageConfig;
  rateLimit: RateLimitConfig;
  retry: RetryPolicy;
  cache: CacheConfig;
};

export const loadConfig = (env: Env = process.env): FolioConfig => ({
  dropbox: loadDropboxConfig(env),
  storage: loadStorageConfig(env),
  rateLimit: loadRateLimitConfig(env),
  retry: loadRetryConfig(env),
  cache: loadCacheConfig(env),
});
