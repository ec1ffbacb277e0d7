/**
 * Blog service tests: read-through, write-then-invalidate, sync
 */
import { describe, expect, it, vi } from "vitest";
import { NOW, doc, metadata, record, setup } from "./helpers.ts";

describe("createBlogService", () => {
  describe("getPost", () => {
    it("should fall through to the remote store and populate index and cache", async () => {
      const { dropbox, index, cache, service } = setup({
        "/BlogStorage/posts/a.md": doc({ title: "A" }, "Remote body"),
      });

      const first = await service.getPost("a");

      expect(first?.remotePath).toBe("/BlogStorage/posts/a.md");
      expect(first?.body).toBe("Remote body");
      expect(first?.metadata.published).toBe(true);
      expect(index.size()).toBe(1);

      const callsBefore = dropbox.calls.length;
      const second = await service.getPost("a");
      expect(second).toEqual(first);
      expect(dropbox.calls.length).toBe(callsBefore);
      expect(cache.getMetrics().hits).toBe(1);
    });

    it("should serve indexed posts without touching the remote store", async () => {
      const { dropbox, service } = setup({}, [record({ slug: "b" })]);

      const post = await service.getPost("b");

      expect(post?.body).toBe("Body of b");
      expect(dropbox.calls).toEqual([]);
    });

    it("should mark posts found in drafts as unpublished", async () => {
      const { service } = setup({
        "/BlogStorage/drafts/d.md": doc({ title: "D", published: true }),
      });

      const post = await service.getPost("d");

      expect(post?.metadata.published).toBe(false);
      expect(post?.remotePath).toBe("/BlogStorage/drafts/d.md");
    });

    it("should return null for an unknown slug", async () => {
      const { service } = setup();

      expect(await service.getPost("missing")).toBeNull();
    });
  });

  describe("listPosts / getStats", () => {
    it("should cache list results by filter key", async () => {
      const { index, service } = setup({}, [record({ slug: "a" }), record({ slug: "b", published: false })]);
      const listPosts = vi.spyOn(index, "listPosts");

      const first = await service.listPosts({ published: true });
      const second = await service.listPosts({ published: true });

      expect(first.total).toBe(1);
      expect(first.posts[0]?.metadata.slug).toBe("a");
      expect(second).toEqual(first);
      expect(listPosts).toHaveBeenCalledTimes(1);
    });

    it("should cache stats", async () => {
      const { index, service } = setup({}, [record({ slug: "a", category: "tech" })]);
      const getStats = vi.spyOn(index, "getStats");

      await service.getStats();
      const stats = await service.getStats();

      expect(stats).toEqual({
        totalPosts: 1,
        publishedPosts: 1,
        draftPosts: 0,
        featuredPosts: 0,
        categories: [{ name: "tech", count: 1 }],
      });
      expect(getStats).toHaveBeenCalledTimes(1);
    });

    it("should feed read latency to the cache", async () => {
      const { cache, service } = setup();

      await service.listPosts();

      expect(cache.getMetrics().avgLatencyMs).toBe(5);
    });
  });

  describe("mutations", () => {
    it("should save, index and then invalidate", async () => {
      const { dropbox, index, cache, service } = setup();
      await service.listPosts();
      expect(cache.getCacheStats().cachedLists).toBe(1);

      const saved = await service.savePost(
        { metadata: metadata({ slug: "new-post", published: false }), body: "Draft" },
        { draft: true }
      );

      expect(saved.remotePath).toBe("/BlogStorage/drafts/new-post.md");
      expect(saved.metadata.published).toBe(false);
      expect(dropbox.files()).toEqual(["/BlogStorage/drafts/new-post.md"]);
      expect(await index.getPost("new-post")).toEqual(saved);
      expect(cache.getCacheStats().cachedLists).toBe(0);
    });

    it("should keep one copy per slug when a draft is saved as published", async () => {
      const { dropbox, index, service } = setup({
        "/BlogStorage/drafts/x.md": doc({ title: "X", published: false }),
      });

      const saved = await service.savePost(
        { metadata: metadata({ slug: "x", published: true }), body: "Live" },
        { draft: false }
      );

      expect(dropbox.files()).toEqual(["/BlogStorage/posts/x.md"]);
      expect((await index.getPost("x"))?.remotePath).toBe(saved.remotePath);
      expect((await service.getPost("x"))?.metadata.published).toBe(true);
    });

    it("should leave the cache alone when the remote write fails", async () => {
      const { dropbox, cache, service } = setup({}, [record({ slug: "a" })]);
      await service.getPost("a");
      dropbox.failNext("uploadFile", "AUTH_ERROR");

      await expect(
        service.savePost({ metadata: metadata({ slug: "a" }), body: "changed" }, { draft: false })
      ).rejects.toMatchObject({ code: "AUTH_ERROR" });

      expect(cache.getCacheStats().cachedPosts).toBe(1);
    });

    it("should publish and reindex the published copy", async () => {
      const { index, service } = setup({
        "/BlogStorage/drafts/x.md": doc({ title: "X", published: false }),
      });

      expect(await service.publishPost("x")).toBe(true);

      const indexed = await index.getPost("x");
      expect(indexed?.metadata.published).toBe(true);
      expect(indexed?.metadata.updatedAt).toEqual(NOW);
      expect(indexed?.remotePath).toBe("/BlogStorage/posts/x.md");
    });

    it("should unpublish and reindex the draft", async () => {
      const { index, service } = setup({ "/BlogStorage/posts/x.md": doc({ title: "X" }) });

      expect(await service.unpublishPost("x")).toBe(true);

      const indexed = await index.getPost("x");
      expect(indexed?.metadata.published).toBe(false);
      expect(indexed?.remotePath).toBe("/BlogStorage/drafts/x.md");
    });

    it("should report a failed publish without touching the index", async () => {
      const { index, service } = setup();

      expect(await service.publishPost("ghost")).toBe(false);
      expect(index.size()).toBe(0);
    });

    it("should delete from the store and the index", async () => {
      const { index, cache, service } = setup({ "/BlogStorage/posts/a.md": doc({ title: "A" }) });
      await service.getPost("a");

      expect(await service.deletePost("a")).toBe(true);

      expect(index.size()).toBe(0);
      expect(cache.getCacheStats().cachedPosts).toBe(0);
    });
  });

  describe("syncFromRemote", () => {
    it("should index published posts and drafts, skipping shadowed drafts", async () => {
      const { index, cache, service } = setup({
        "/BlogStorage/posts/a.md": doc({ title: "A" }),
        "/BlogStorage/posts/b.md": doc({ title: "B" }),
        "/BlogStorage/drafts/c.md": doc({ title: "C", published: false }),
        "/BlogStorage/drafts/a.md": doc({ title: "A", published: false }),
      });
      await service.listPosts();

      const result = await service.syncFromRemote();

      expect(result).toEqual({ synced: 3, skipped: 1, failed: 0 });
      expect((await index.getPost("a"))?.metadata.published).toBe(true);
      expect((await index.getPost("c"))?.metadata.published).toBe(false);
      expect(cache.getCacheStats()).toEqual({ cachedPosts: 0, cachedLists: 0, cachedStats: 0 });
    });

    it("should count posts the index rejects", async () => {
      const { index, service } = setup({
        "/BlogStorage/posts/a.md": doc({ title: "A" }),
        "/BlogStorage/posts/b.md": doc({ title: "B" }),
      });
      const upsert = index.upsertPost;
      vi.spyOn(index, "upsertPost").mockImplementation(async (rec) => {
        if (rec.metadata.slug === "b") throw new Error("constraint violation");
        await upsert(rec);
      });

      expect(await service.syncFromRemote()).toEqual({ synced: 1, skipped: 0, failed: 1 });
    });
  });
});
