/**
 * Post data model
 *
 * A post has no identity beyond its slug and the remote path it was read
 * from; every read rebuilds it from the stored document.
 */

import { z } from "zod";

// ============================================================================
// Slugs
// ============================================================================

/** Lowercase alphanumerics separated by single hyphens */
export const SLUG_REGEX = /^[a-z0-9]+(?:-[a-z0-9]+)*$/;

export const SlugSchema = z.string().regex(SLUG_REGEX, "Invalid slug");

export const isValidSlug = (slug: string): boolean => SLUG_REGEX.test(slug);

/**
 * Generate a URL-safe slug: lowercase, every run of characters outside
 * [a-z0-9] becomes one hyphen, leading/trailing hyphens removed.
 *
 * Example: "Hello, World! 2024" -> "hello-world-2024"
 */
export const generateSlug = (title: string): string =>
  title
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "");

// ============================================================================
// Metadata
// ============================================================================

export type PostMetadata = {
  title: string;
  slug: string;
  createdAt: Date;
  updatedAt: Date;
  category?: string;
  /** Set semantics; order is kept only for stable rendering */
  tags: string[];
  published: boolean;
  author?: string;
  excerpt?: string;
  /** Frontmatter fields outside the known set, preserved on render */
  extra: Record<string, unknown>;
};

/**
 * A post as read from or written to the remote store.
 */
export type StoredPost = {
  metadata: PostMetadata;
  /** Markdown body, byte-identical to what follows the frontmatter */
  body: string;
  /** Remote path the post was loaded from or written to */
  path: string;
};

// ============================================================================
// Statistics
// ============================================================================

export type BlogStats = {
  publishedPosts: number;
  draftPosts: number;
  /** Category name → number of published posts */
  categories: Record<string, number>;
  /** Tag → number of published posts */
  tags: Record<string, number>;
  lastUpdated: Date;
};
