/**
 * Shared fixtures for blog-service tests
 */
import { createContentCache } from "@folio/content-cache";
import { createMemoryDropbox } from "@folio/dropbox";
import { createPostStore } from "@folio/post-store";
import type { Logger, PostMetadata } from "@folio/protocol";
import { createRateLimiter } from "@folio/rate-limiter";
import { vi } from "vitest";
import { createBlogService } from "../src/blog-service.ts";
import { createMemoryPostIndex } from "../src/memory-index.ts";
import type { IndexStats, PostRecord, PostSummary } from "../src/types.ts";

export const NOW = new Date("2024-06-01T12:00:00.000Z");

export const createLogger = (): Logger => ({
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
});

export const doc = (fields: Record<string, string | boolean>, body = "Body"): string => {
  const lines = Object.entries(fields).map(([k, v]) => `${k}: ${v}`);
  return `---\n${lines.join("\n")}\n---\n\n${body}`;
};

export const metadata = (overrides: Partial<PostMetadata> = {}): PostMetadata => ({
  title: "Hello",
  slug: "hello",
  createdAt: new Date("2024-01-01T00:00:00.000Z"),
  updatedAt: new Date("2024-01-01T00:00:00.000Z"),
  tags: [],
  published: true,
  extra: {},
  ...overrides,
});

export const record = (overrides: Partial<PostMetadata> = {}, featured = false): PostRecord => {
  const meta = metadata(overrides);
  return {
    metadata: meta,
    body: `Body of ${meta.slug}`,
    remotePath: `/BlogStorage/${meta.published ? "posts" : "drafts"}/${meta.slug}.md`,
    featured,
  };
};

export const setup = (files: Record<string, string> = {}, records: PostRecord[] = []) => {
  const logger = createLogger();
  const dropbox = createMemoryDropbox({ files });
  const limiter = createRateLimiter({ maxRequests: 10_000, windowMs: 60_000, logger });
  const store = createPostStore({
    gateway: dropbox,
    limiter,
    logger,
    now: () => NOW,
    sleep: async () => {},
  });
  const index = createMemoryPostIndex(records);
  const cache = createContentCache<PostRecord, PostSummary, IndexStats>({}, { now: () => 0, logger });
  const clock = { t: 0 };
  const service = createBlogService({
    store,
    index,
    cache,
    logger,
    now: () => {
      clock.t += 5;
      return clock.t;
    },
  });
  return { dropbox, store, index, cache, service, logger };
};
