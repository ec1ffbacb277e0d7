/**
 * Post index contract
 *
 * The relational copy of the blog's posts. Request handlers query it; the
 * service keeps it in step with the remote store.
 */

import type { ListFilters } from "@folio/content-cache";
import type { PostMetadata, StoredPost } from "@folio/protocol";

// ============================================================================
// Records
// ============================================================================

export type PostRecord = {
  metadata: PostMetadata;
  body: string;
  /** Remote path of the document the record was built from */
  remotePath: string;
  featured: boolean;
};

export type PostSummary = Omit<PostRecord, "body">;

export type PostPage = {
  posts: PostSummary[];
  /** Matches across all pages */
  total: number;
};

export type IndexStats = {
  totalPosts: number;
  publishedPosts: number;
  draftPosts: number;
  featuredPosts: number;
  /** Published posts per category, most used first */
  categories: { name: string; count: number }[];
};

// ============================================================================
// Index
// ============================================================================

export type PostIndex = {
  listPosts: (filters: ListFilters) => Promise<PostPage>;
  getPost: (slug: string) => Promise<PostRecord | null>;
  /** Insert or replace by slug */
  upsertPost: (record: PostRecord) => Promise<void>;
  /** false when no record had the slug */
  deletePost: (slug: string) => Promise<boolean>;
  getStats: () => Promise<IndexStats>;
};

// ============================================================================
// Helpers
// ============================================================================

export const DEFAULT_PER_PAGE = 10;

/** Frontmatter key that marks a post as featured */
export const FEATURED_KEY = "featured";

/**
 * Index record for a stored post. Folder membership decides `published`:
 * a document in the drafts folder is a draft whatever its frontmatter says.
 */
export const toPostRecord = (post: StoredPost, options: { draft: boolean }): PostRecord => ({
  metadata: { ...post.metadata, published: !options.draft },
  body: post.body,
  remotePath: post.path,
  featured: post.metadata.extra[FEATURED_KEY] === true,
});

export const toPostSummary = ({ body: _body, ...summary }: PostRecord): PostSummary => summary;
