/**
 * Folio - Bootstrap
 *
 * Builds the object graph once; every consumer shares these instances.
 */

import { createContentCache } from "@folio/content-cache";
import { createDropboxClient, type RemoteFileGateway } from "@folio/dropbox";
import { createPostStore, type PostStore } from "@folio/post-store";
import type { Logger } from "@folio/protocol";
import { createRateLimiter, type RateLimiter } from "@folio/rate-limiter";
import { type BlogCache, type BlogService, createBlogService } from "./blog-service.ts";
import type { FolioConfig } from "./config.ts";
import { createMemoryPostIndex } from "./memory-index.ts";
import type { IndexStats, PostIndex, PostRecord, PostSummary } from "./types.ts";

export type FolioDeps = {
  logger?: Logger;
  /** Replaces the Dropbox client (tests, local development) */
  gateway?: RemoteFileGateway;
  /** Replaces the in-memory index with a database-backed one */
  index?: PostIndex;
};

export type Folio = {
  gateway: RemoteFileGateway;
  limiter: RateLimiter;
  store: PostStore;
  cache: BlogCache;
  index: PostIndex;
  service: BlogService;
};

export const createFolio = (config: FolioConfig, deps: FolioDeps = {}): Folio => {
  const logger = deps.logger ?? console;

  const cache = createContentCache<PostRecord, PostSummary, IndexStats>(config.cache, { logger });
  const limiter = createRateLimiter({
    ...config.rateLimit,
    logger,
    onAcquire: () => cache.recordRemoteCall(),
  });
  const gateway = deps.gateway ?? createDropboxClient(config.dropbox);
  const store = createPostStore({
    gateway,
    limiter,
    root: config.storage.root,
    retry: config.retry,
    logger,
  });
  const index = deps.index ?? createMemoryPostIndex();
  const service = createBlogService({ store, index, cache, logger });

  return { gateway, limiter, store, cache, index, service };
};
