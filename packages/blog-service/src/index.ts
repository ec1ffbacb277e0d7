/**
 * @folio/blog-service
 *
 * Orchestration over the post store, the post index and the content
 * cache, plus configuration loading and wiring.
 */

export { createFolio, type Folio, type FolioDeps } from "./bootstrap.ts";
export {
  type BlogCache,
  type BlogService,
  type BlogServiceConfig,
  createBlogService,
  type SyncResult,
} from "./blog-service.ts";
export {
  type DropboxConfig,
  type Env,
  type FolioConfig,
  loadCacheConfig,
  loadConfig,
  loadDropboxConfig,
  loadRateLimitConfig,
  loadRetryConfig,
  loadStorageConfig,
  type RateLimitConfig,
  type StorageConfig,
} from "./config.ts";
export { createMemoryPostIndex, type MemoryPostIndex } from "./memory-index.ts";
export {
  DEFAULT_PER_PAGE,
  FEATURED_KEY,
  type IndexStats,
  type PostIndex,
  type PostPage,
  type PostRecord,
  type PostSummary,
  toPostRecord,
  toPostSummary,
} from "./types.ts";
