/**
 * In-memory PostIndex
 *
 * Same filtering, ordering and paging rules a relational index applies;
 * used by tests and by the CLI, which has no database.
 */

import type { ListFilters } from "@folio/content-cache";
import {
  DEFAULT_PER_PAGE,
  type IndexStats,
  type PostIndex,
  type PostPage,
  type PostRecord,
  toPostSummary,
} from "./types.ts";

export type MemoryPostIndex = PostIndex & {
  /** Number of stored records */
  size: () => number;
};

const matches = (record: PostRecord, filters: ListFilters): boolean => {
  const { metadata } = record;
  if (filters.category !== undefined && metadata.category !== filters.category) return false;
  if (filters.tag !== undefined && !metadata.tags.includes(filters.tag)) return false;
  if (filters.published !== undefined && metadata.published !== filters.published) return false;
  if (filters.featured !== undefined && record.featured !== filters.featured) return false;
  return true;
};

/** Newest first; slug ascending on ties */
const compareRecords = (a: PostRecord, b: PostRecord): number => {
  const diff = b.metadata.createdAt.getTime() - a.metadata.createdAt.getTime();
  if (diff !== 0) return diff;
  return a.metadata.slug < b.metadata.slug ? -1 : a.metadata.slug > b.metadata.slug ? 1 : 0;
};

export const createMemoryPostIndex = (records: PostRecord[] = []): MemoryPostIndex => {
  const bySlug = new Map<string, PostRecord>(records.map((r) => [r.metadata.slug, r]));

  return {
    async listPosts(filters): Promise<PostPage> {
      const all = [...bySlug.values()].filter((r) => matches(r, filters)).sort(compareRecords);
      if (filters.page === undefined && filters.perPage === undefined) {
        return { posts: all.map(toPostSummary), total: all.length };
      }

      const perPage = Math.max(1, filters.perPage ?? DEFAULT_PER_PAGE);
      const page = Math.max(1, filters.page ?? 1);
      const start = (page - 1) * perPage;
      return { posts: all.slice(start, start + perPage).map(toPostSummary), total: all.length };
    },

    getPost: async (slug) => bySlug.get(slug) ?? null,

    async upsertPost(record) {
      bySlug.set(record.metadata.slug, record);
    },

    deletePost: async (slug) => bySlug.delete(slug),

    async getStats(): Promise<IndexStats> {
      const all = [...bySlug.values()];
      const published = all.filter((r) => r.metadata.published);
      const counts = new Map<string, number>();
      for (const { metadata } of published) {
        if (metadata.category !== undefined) {
          counts.set(metadata.category, (counts.get(metadata.category) ?? 0) + 1);
        }
      }
      return {
        totalPosts: all.length,
        publishedPosts: published.length,
        draftPosts: all.length - published.length,
        featuredPosts: all.filter((r) => r.featured).length,
        categories: [...counts.entries()]
          .map(([name, count]) => ({ name, count }))
          .sort((a, b) => b.count - a.count || (a.name < b.name ? -1 : a.name > b.name ? 1 : 0)),
      };
    },

    size: () => bySlug.size,
  };
};
