/**
 * Blog service
 *
 * Reads go cache → index → remote store, populating the layers they
 * missed. Writes go remote store → index, and only once both succeeded is
 * the cache invalidated. There is no transaction across the three: a
 * failure part-way leaves the cache untouched and the next read sees
 * whatever the stores hold.
 *
 * @packageDocumentation
 */

import { buildListCacheKey, type ContentCache, type ListFilters } from "@folio/content-cache";
import type { PostInput, PostStore, SavePostOptions } from "@folio/post-store";
import type { Logger, StoredPost } from "@folio/protocol";
import {
  type IndexStats,
  type PostIndex,
  type PostPage,
  type PostRecord,
  type PostSummary,
  toPostRecord,
} from "./types.ts";

// ============================================================================
// Types
// ============================================================================

export type BlogCache = ContentCache<PostRecord, PostSummary, IndexStats>;

export type BlogServiceConfig = {
  store: PostStore;
  index: PostIndex;
  cache: BlogCache;
  logger?: Logger;
  /** Monotonic clock for read latency (default: performance.now) */
  now?: () => number;
};

export type SyncResult = {
  /** Posts written to the index */
  synced: number;
  /** Drafts shadowed by a published copy of the same slug */
  skipped: number;
  /** Posts the index rejected */
  failed: number;
};

export type BlogService = {
  getPost: (slug: string) => Promise<PostRecord | null>;
  listPosts: (filters?: ListFilters) => Promise<PostPage>;
  getStats: () => Promise<IndexStats>;
  savePost: (post: PostInput, options: SavePostOptions) => Promise<PostRecord>;
  deletePost: (slug: string) => Promise<boolean>;
  publishPost: (slug: string) => Promise<boolean>;
  unpublishPost: (slug: string) => Promise<boolean>;
  /** Copy every remote post into the index, then flush the cache */
  syncFromRemote: () => Promise<SyncResult>;
};

// ============================================================================
// Factory
// ============================================================================

export const createBlogService = (config: BlogServiceConfig): BlogService => {
  const { store, index, cache, logger = console, now = () => performance.now() } = config;

  /** Run a read and feed its duration to the latency average */
  const timed = async <T>(read: () => Promise<T>): Promise<T> => {
    const started = now();
    try {
      return await read();
    } finally {
      cache.updateLatency(now() - started);
    }
  };

  const draftsRoot = store.folderPath("drafts").toLowerCase();

  const recordFor = (post: StoredPost): PostRecord =>
    toPostRecord(post, { draft: post.path.toLowerCase().startsWith(`${draftsRoot}/`) });

  /** Re-read a post from the remote store after a move and index it */
  const reindex = async (slug: string): Promise<void> => {
    const post = await store.getPostBySlug(slug);
    if (post) {
      await index.upsertPost(recordFor(post));
    } else {
      await index.deletePost(slug);
    }
  };

  return {
    getPost: (slug) =>
      timed(async () => {
        const cached = cache.getPost(slug);
        if (cached) return cached;

        const indexed = await index.getPost(slug);
        if (indexed) {
          cache.setPost(slug, indexed);
          return indexed;
        }

        const stored = await store.getPostBySlug(slug);
        if (!stored) return null;
        const record = recordFor(stored);
        await index.upsertPost(record);
        cache.setPost(slug, record);
        logger.debug(`[blog-service] loaded ${slug} from ${stored.path}`);
        return record;
      }),

    listPosts: (filters = {}) =>
      timed(async () => {
        const key = buildListCacheKey(filters);
        const cached = cache.getList(key);
        if (cached) return cached;

        const page = await index.listPosts(filters);
        cache.setList(key, page.posts, page.total);
        return page;
      }),

    getStats: () =>
      timed(async () => {
        const cached = cache.getStats();
        if (cached) return cached;

        const stats = await index.getStats();
        cache.setStats(stats);
        return stats;
      }),

    async savePost(post, options) {
      const stored = await store.savePost(post, options);
      const record = toPostRecord(stored, options);
      await index.upsertPost(record);
      cache.invalidatePost(record.metadata.slug);
      return record;
    },

    async deletePost(slug) {
      const removed = await store.deletePost(slug);
      await index.deletePost(slug);
      cache.invalidatePost(slug);
      return removed;
    },

    async publishPost(slug) {
      if (!(await store.publishPost(slug))) return false;
      await reindex(slug);
      cache.invalidatePost(slug);
      return true;
    },

    async unpublishPost(slug) {
      if (!(await store.unpublishPost(slug))) return false;
      await reindex(slug);
      cache.invalidatePost(slug);
      return true;
    },

    async syncFromRemote() {
      const published = await store.listPublishedPosts();
      const drafts = await store.listDraftPosts();
      const result: SyncResult = { synced: 0, skipped: 0, failed: 0 };
      const seen = new Set<string>();

      const sync = async (post: StoredPost, draft: boolean): Promise<void> => {
        const { slug } = post.metadata;
        if (seen.has(slug)) {
          logger.warn(`[blog-service] ${post.path} duplicates slug "${slug}", skipped`);
          result.skipped++;
          return;
        }
        seen.add(slug);
        try {
          await index.upsertPost(toPostRecord(post, { draft }));
          result.synced++;
        } catch (err) {
          const reason = err instanceof Error ? err.message : String(err);
          logger.warn(`[blog-service] failed to index ${post.path}: ${reason}`);
          result.failed++;
        }
      };

      for (const post of published) await sync(post, false);
      for (const post of drafts) await sync(post, true);

      cache.invalidateAll();
      logger.info(
        `[blog-service] sync finished: ${result.synced} synced, ${result.skipped} skipped, ${result.failed} failed`
      );
      return result;
    },
  };
};
