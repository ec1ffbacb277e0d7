/**
 * File-backed post store
 *
 * Posts are markdown documents under a fixed folder layout:
 *
 *   {root}/posts/{slug}.md     published
 *   {root}/drafts/{slug}.md    drafts
 *   {root}/media/{images,videos}, {root}/templates, {root}/config
 *
 * Every remote call acquires a rate-limiter slot first and is retried on
 * transient failures. A slug lives in at most one of posts/drafts; publish
 * and unpublish move it with two remote calls (write, then delete), so a
 * crash in between leaves a copy in both folders. Lookups prefer the
 * published copy in that case.
 *
 * @packageDocumentation
 */

import type { RemoteFileGateway } from "@folio/dropbox";
import {
  FrontmatterParseError,
  parseDocument,
  renderDocument,
  titleFromFileName,
} from "@folio/frontmatter";
import {
  ALREADY_EXISTS,
  BLOG_FOLDERS,
  type BlogFolder,
  type BlogStats,
  DEFAULT_STORAGE_ROOT,
  type FileMetadata,
  type GatewayResult,
  INVALID_SLUG,
  isMarkdownFile,
  isValidSlug,
  joinPath,
  type Logger,
  MEDIA_SUBFOLDERS,
  NOT_FOUND,
  type StoredPost,
} from "@folio/protocol";
import type { RateLimiter } from "@folio/rate-limiter";
import { PostStoreError } from "./errors.ts";
import { callWithRetry, DEFAULT_RETRY_POLICY, type RetryContext, type RetryPolicy } from "./retry.ts";

// ============================================================================
// Types
// ============================================================================

export type PostStoreConfig = {
  gateway: RemoteFileGateway;
  limiter: RateLimiter;
  /** Storage root on the remote (default: /BlogStorage) */
  root?: string;
  retry?: Partial<RetryPolicy>;
  logger?: Logger;
  /** Wall clock for timestamps written into posts */
  now?: () => Date;
  /** Used between retries (default: setTimeout) */
  sleep?: (ms: number) => Promise<void>;
};

/** What a caller supplies to save a post; the store decides the path */
export type PostInput = Pick<StoredPost, "metadata" | "body">;

export type SavePostOptions = {
  /** true → drafts folder, false → posts folder */
  draft: boolean;
};

export type PostStore = {
  readonly root: string;
  folderPath: (folder: BlogFolder) => string;
  /** Create any missing folder of the layout. Safe to repeat. */
  initializeStructure: () => Promise<void>;
  /** Published posts, newest `createdAt` first */
  listPublishedPosts: () => Promise<StoredPost[]>;
  /** Drafts, most recently updated first */
  listDraftPosts: () => Promise<StoredPost[]>;
  getPostBySlug: (slug: string) => Promise<StoredPost | null>;
  /** Upload (overwrite) `{drafts|posts}/{slug}.md`; the other folder's copy is deleted */
  savePost: (post: PostInput, options: SavePostOptions) => Promise<StoredPost>;
  /** true when a copy was deleted, false when neither folder had one */
  deletePost: (slug: string) => Promise<boolean>;
  /** Move a draft to posts. false when no draft has the slug. */
  publishPost: (slug: string) => Promise<boolean>;
  /** Move a published post back to drafts. false when none has the slug. */
  unpublishPost: (slug: string) => Promise<boolean>;
  getBlogStats: () => Promise<BlogStats>;
};

// ============================================================================
// Helpers
// ============================================================================

const encoder = new TextEncoder();
const decoder = new TextDecoder();

const defaultSleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

/** Newest first; slug ascending on ties */
const byDateDesc =
  (field: "createdAt" | "updatedAt") =>
  (a: StoredPost, b: StoredPost): number => {
    const diff = b.metadata[field].getTime() - a.metadata[field].getTime();
    if (diff !== 0) return diff;
    return a.metadata.slug < b.metadata.slug ? -1 : a.metadata.slug > b.metadata.slug ? 1 : 0;
  };

const isDocumentEntry = (entry: FileMetadata): boolean =>
  entry[".tag"] !== "folder" && entry[".tag"] !== "deleted" && isMarkdownFile(entry.name);

// ============================================================================
// Factory
// ============================================================================

export const createPostStore = (config: PostStoreConfig): PostStore => {
  const {
    gateway,
    limiter,
    root = DEFAULT_STORAGE_ROOT,
    logger = console,
    now = () => new Date(),
    sleep = defaultSleep,
  } = config;

  const policy: RetryPolicy = { ...DEFAULT_RETRY_POLICY, ...config.retry };
  if (!Number.isInteger(policy.maxAttempts) || policy.maxAttempts < 1) {
    throw new Error(`retry.maxAttempts must be a positive integer (got ${policy.maxAttempts})`);
  }

  const retryContext: RetryContext = { limiter, policy, sleep, logger };

  const folderPath = (folder: BlogFolder): string => joinPath(root, folder);
  const postPath = (folder: BlogFolder, slug: string): string => joinPath(root, folder, `${slug}.md`);

  /** Rate-limited, retried gateway call */
  const remote = <T>(
    operation: string,
    path: string,
    call: () => Promise<GatewayResult<T>>
  ): Promise<GatewayResult<T>> => callWithRetry(retryContext, `${operation} ${path}`, call);

  const unwrap = <T>(operation: string, path: string, result: GatewayResult<T>): T => {
    if (!result.ok) throw PostStoreError.fromGateway(operation, path, result.error);
    return result.data;
  };

  // --------------------------------------------------------------------------
  // Reading
  // --------------------------------------------------------------------------

  /** All entries of a folder, following pagination. Missing folder → []. */
  const listEntries = async (operation: string, path: string): Promise<FileMetadata[]> => {
    const first = await remote(operation, path, () => gateway.listFolder(path));
    if (!first.ok && first.error.code === NOT_FOUND) {
      logger.warn(`[post-store] ${path} does not exist; run initializeStructure first`);
      return [];
    }

    let page = unwrap(operation, path, first);
    const entries = [...page.entries];
    while (page.has_more) {
      const cursor = page.cursor;
      page = unwrap(operation, path, await remote(operation, path, () => gateway.listFolderContinue(cursor)));
      entries.push(...page.entries);
    }
    return entries;
  };

  /** Download and decode one entry; null when it cannot be used */
  const loadPost = async (operation: string, entry: FileMetadata): Promise<StoredPost | null> => {
    const path = entry.path_display;
    const downloaded = await remote(operation, path, () => gateway.downloadFile(path));
    if (!downloaded.ok) {
      logger.warn(`[post-store] skipping ${path}: ${downloaded.error.message}`);
      return null;
    }

    try {
      const parsed = parseDocument(decoder.decode(downloaded.data), titleFromFileName(entry.name), now());
      if (!parsed) {
        logger.debug(`[post-store] skipping ${path}: no frontmatter`);
        return null;
      }
      return { metadata: parsed.metadata, body: parsed.body, path };
    } catch (err) {
      if (!(err instanceof FrontmatterParseError)) throw err;
      logger.warn(`[post-store] skipping ${path}: ${err.message}`);
      return null;
    }
  };

  const loadFolder = async (operation: string, folder: BlogFolder): Promise<StoredPost[]> => {
    const entries = await listEntries(operation, folderPath(folder));
    const loaded = await Promise.all(
      entries.filter(isDocumentEntry).map((entry) => loadPost(operation, entry))
    );
    return loaded.filter((post): post is StoredPost => post !== null);
  };

  const listPublishedPosts = async (): Promise<StoredPost[]> => {
    const posts = await loadFolder("listPublishedPosts", "posts");
    const published = posts.filter((post) => {
      if (!post.metadata.published) logger.debug(`[post-store] skipping unpublished ${post.path}`);
      return post.metadata.published;
    });
    return published.sort(byDateDesc("createdAt"));
  };

  const listDraftPosts = async (): Promise<StoredPost[]> => {
    const drafts = await loadFolder("listDraftPosts", "drafts");
    return drafts.sort(byDateDesc("updatedAt"));
  };

  // --------------------------------------------------------------------------
  // Writing
  // --------------------------------------------------------------------------

  const writePost = async (post: PostInput, folder: BlogFolder): Promise<StoredPost> => {
    const { slug } = post.metadata;
    if (!isValidSlug(slug)) {
      throw new PostStoreError(INVALID_SLUG, "savePost", folderPath(folder), `invalid slug "${slug}"`);
    }

    const path = postPath(folder, slug);
    const content = encoder.encode(renderDocument(post.metadata, post.body));
    unwrap("savePost", path, await remote("savePost", path, () => gateway.uploadFile(path, content)));
    logger.info(`[post-store] saved "${post.metadata.title}" to ${path}`);
    return { metadata: post.metadata, body: post.body, path };
  };

  /** Upload into one folder and drop the other folder's copy of the slug */
  const savePost = async (post: PostInput, options: SavePostOptions): Promise<StoredPost> => {
    const folder: BlogFolder = options.draft ? "drafts" : "posts";
    const saved = await writePost(post, folder);

    const stale = postPath(options.draft ? "posts" : "drafts", post.metadata.slug);
    if (await deleteFile("savePost", stale)) {
      logger.info(`[post-store] removed ${stale} superseded by ${saved.path}`);
    }
    return saved;
  };

  /** Delete a file; false when it was already gone */
  const deleteFile = async (operation: string, path: string): Promise<boolean> => {
    const result = await remote(operation, path, () => gateway.deleteFile(path));
    if (!result.ok && result.error.code === NOT_FOUND) return false;
    unwrap(operation, path, result);
    return true;
  };

  /**
   * Write the post into `target`, then delete the source copy. A source that
   * is already gone still counts as a completed move.
   */
  const move = async (
    operation: string,
    post: StoredPost,
    target: BlogFolder,
    published: boolean
  ): Promise<void> => {
    const metadata = { ...post.metadata, published, updatedAt: now() };
    await writePost({ metadata, body: post.body }, target);

    const deleted = await deleteFile(operation, post.path);
    if (!deleted) {
      logger.warn(`[post-store] ${operation}: ${post.path} was already gone`);
    }
  };

  return {
    root,
    folderPath,

    async initializeStructure() {
      const folders = [
        ...BLOG_FOLDERS.map(folderPath),
        ...MEDIA_SUBFOLDERS.map((sub) => joinPath(root, "media", sub)),
      ];

      for (const path of folders) {
        const listed = await remote("initializeStructure", path, () => gateway.listFolder(path));
        if (listed.ok) {
          logger.debug(`[post-store] folder exists: ${path}`);
          continue;
        }
        if (listed.error.code !== NOT_FOUND) {
          throw PostStoreError.fromGateway("initializeStructure", path, listed.error);
        }

        const created = await remote("initializeStructure", path, () => gateway.createFolder(path));
        if (!created.ok && created.error.code === ALREADY_EXISTS) continue;
        unwrap("initializeStructure", path, created);
        logger.info(`[post-store] created folder ${path}`);
      }
    },

    listPublishedPosts,
    listDraftPosts,

    async getPostBySlug(slug) {
      const published = (await listPublishedPosts()).find((p) => p.metadata.slug === slug);
      if (published) return published;
      const draft = (await listDraftPosts()).find((p) => p.metadata.slug === slug);
      return draft ?? null;
    },

    savePost,

    async deletePost(slug) {
      for (const folder of ["posts", "drafts"] as const) {
        const path = postPath(folder, slug);
        if (await deleteFile("deletePost", path)) {
          logger.info(`[post-store] deleted ${path}`);
          return true;
        }
      }
      logger.warn(`[post-store] no post with slug "${slug}" to delete`);
      return false;
    },

    async publishPost(slug) {
      const draft = (await listDraftPosts()).find((p) => p.metadata.slug === slug);
      if (!draft) {
        logger.warn(`[post-store] no draft with slug "${slug}" to publish`);
        return false;
      }
      await move("publishPost", draft, "posts", true);
      logger.info(`[post-store] published "${slug}"`);
      return true;
    },

    async unpublishPost(slug) {
      const post = (await listPublishedPosts()).find((p) => p.metadata.slug === slug);
      if (!post) {
        logger.warn(`[post-store] no published post with slug "${slug}" to unpublish`);
        return false;
      }
      await move("unpublishPost", post, "drafts", false);
      logger.info(`[post-store] unpublished "${slug}"`);
      return true;
    },

    async getBlogStats() {
      const published = await listPublishedPosts();
      const drafts = await listDraftPosts();
      const categories: Record<string, number> = {};
      const tags: Record<string, number> = {};
      for (const { metadata } of published) {
        if (metadata.category !== undefined) {
          categories[metadata.category] = (categories[metadata.category] ?? 0) + 1;
        }
        for (const tag of metadata.tags) {
          tags[tag] = (tags[tag] ?? 0) + 1;
        }
      }
      return {
        publishedPosts: published.length,
        draftPosts: drafts.length,
        categories,
        tags,
        lastUpdated: now(),
      };
    },
  };
};
