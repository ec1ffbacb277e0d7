/**
 * Canonical keys for cached post-list queries
 */

export type ListFilters = {
  category?: string;
  tag?: string;
  published?: boolean;
  featured?: boolean;
  page?: number;
  perPage?: number;
};

/** Key used when no filter is set */
export const ALL_POSTS_KEY = "all_posts";

/**
 * Build the cache key of a list query: the present filters in a fixed
 * order (`cat`, `tag`, `pub`, `feat`, `page`, `per_page`) as `name:value`,
 * joined by `:`. String values are percent-encoded, so a `:` inside a
 * category or tag cannot shift a field boundary.
 *
 * Example: { category: "tech", published: true, page: 1, perPage: 10 }
 *   -> "cat:tech:pub:true:page:1:per_page:10"
 */
export const buildListCacheKey = (filters: ListFilters = {}): string => {
  const parts: string[] = [];
  if (filters.category !== undefined) parts.push(`cat:${encodeURIComponent(filters.category)}`);
  if (filters.tag !== undefined) parts.push(`tag:${encodeURIComponent(filters.tag)}`);
  if (filters.published !== undefined) parts.push(`pub:${filters.published}`);
  if (filters.featured !== undefined) parts.push(`feat:${filters.featured}`);
  if (filters.page !== undefined) parts.push(`page:${filters.page}`);
  if (filters.perPage !== undefined) parts.push(`per_page:${filters.perPage}`);
  return parts.length > 0 ? parts.join(":") : ALL_POSTS_KEY;
};
