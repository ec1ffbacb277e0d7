/**
 * Unit tests for the in-memory gateway
 */

import { describe, expect, it } from "vitest";
import { createMemoryDropbox } from "./memory-dropbox.ts";

const text = (bytes: Uint8Array) => new TextDecoder().decode(bytes);

describe("createMemoryDropbox", () => {
  describe("uploadFile / downloadFile", () => {
    it("should store bytes and create missing parent folders", async () => {
      const dropbox = createMemoryDropbox({ now: () => Date.UTC(2024, 0, 2) });

      const uploaded = await dropbox.uploadFile("/Blog/posts/a.md", new TextEncoder().encode("hi"));

      expect(uploaded).toEqual({
        ok: true,
        data: {
          ".tag": "file",
          name: "a.md",
          path_lower: "/blog/posts/a.md",
          path_display: "/Blog/posts/a.md",
          size: 2,
          server_modified: "2024-01-02T00:00:00.000Z",
        },
      });
      expect(dropbox.folders()).toEqual(["/Blog", "/Blog/posts"]);

      const downloaded = await dropbox.downloadFile("/blog/POSTS/a.md");
      expect(downloaded.ok && text(downloaded.data)).toBe("hi");
    });

    it("should overwrite and keep the original display path", async () => {
      const dropbox = createMemoryDropbox({ files: { "/Blog/A.md": "one" } });

      await dropbox.uploadFile("/blog/a.md", new TextEncoder().encode("two"));

      expect(dropbox.files()).toEqual(["/Blog/A.md"]);
      expect(dropbox.readText("/Blog/A.md")).toBe("two");
    });

    it("should report a missing file as NOT_FOUND", async () => {
      const dropbox = createMemoryDropbox();

      const result = await dropbox.downloadFile("/nope.md");

      expect(result).toEqual({
        ok: false,
        error: { code: "NOT_FOUND", message: "path/not_found/ /nope.md", status: 409, details: undefined },
      });
    });
  });

  describe("listFolder", () => {
    it("should list direct children sorted by lower-case path", async () => {
      const dropbox = createMemoryDropbox({
        files: { "/Blog/b.md": "b", "/Blog/A.md": "a", "/Blog/sub/c.md": "c" },
      });

      const result = await dropbox.listFolder("/Blog");

      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.data.entries.map((e) => e.path_display)).toEqual([
          "/Blog/A.md",
          "/Blog/b.md",
          "/Blog/sub",
        ]);
        expect(result.data.entries.map((e) => e[".tag"])).toEqual(["file", "file", "folder"]);
        expect(result.data.has_more).toBe(false);
      }
    });

    it("should paginate with a continuation cursor", async () => {
      const dropbox = createMemoryDropbox({
        files: { "/p/1.md": "", "/p/2.md": "", "/p/3.md": "" },
        pageSize: 2,
      });

      const first = await dropbox.listFolder("/p");
      if (!first.ok) throw new Error("listing failed");
      expect(first.data.entries.map((e) => e.name)).toEqual(["1.md", "2.md"]);
      expect(first.data.has_more).toBe(true);

      const second = await dropbox.listFolderContinue(first.data.cursor);
      if (!second.ok) throw new Error("continue failed");
      expect(second.data.entries.map((e) => e.name)).toEqual(["3.md"]);
      expect(second.data.has_more).toBe(false);
    });

    it("should report a missing folder as NOT_FOUND", async () => {
      const dropbox = createMemoryDropbox();

      const result = await dropbox.listFolder("/missing");

      expect(!result.ok && result.error.code).toBe("NOT_FOUND");
    });
  });

  describe("createFolder / deleteFile", () => {
    it("should refuse to create an existing folder", async () => {
      const dropbox = createMemoryDropbox({ folders: ["/Blog"] });

      const result = await dropbox.createFolder("/blog");

      expect(!result.ok && result.error.code).toBe("ALREADY_EXISTS");
    });

    it("should delete folders recursively", async () => {
      const dropbox = createMemoryDropbox({ files: { "/Blog/posts/a.md": "a", "/Other/b.md": "b" } });

      const result = await dropbox.deleteFile("/Blog");

      expect(result.ok && result.data[".tag"]).toBe("folder");
      expect(dropbox.files()).toEqual(["/Other/b.md"]);
      expect(dropbox.folders()).toEqual(["/Other"]);
    });

    it("should report deleting a missing path as NOT_FOUND", async () => {
      const dropbox = createMemoryDropbox();

      const result = await dropbox.deleteFile("/gone.md");

      expect(!result.ok && result.error.code).toBe("NOT_FOUND");
    });
  });

  describe("failNext", () => {
    it("should fail the next calls of one method without touching state", async () => {
      const dropbox = createMemoryDropbox();
      dropbox.failNext("uploadFile", "NETWORK_ERROR", 2);
      const bytes = new TextEncoder().encode("x");

      const first = await dropbox.uploadFile("/a.md", bytes);
      const second = await dropbox.uploadFile("/a.md", bytes);
      const third = await dropbox.uploadFile("/a.md", bytes);

      expect(!first.ok && first.error.message).toBe("Injected NETWORK_ERROR for uploadFile");
      expect(second.ok).toBe(false);
      expect(third.ok).toBe(true);
      expect(dropbox.calls).toEqual([
        { method: "uploadFile", arg: "/a.md" },
        { method: "uploadFile", arg: "/a.md" },
        { method: "uploadFile", arg: "/a.md" },
      ]);
    });
  });

  describe("testConnection", () => {
    it("should report the memory account", async () => {
      const dropbox = createMemoryDropbox();

      const result = await dropbox.testConnection();

      expect(result.ok && result.data.account_id).toBe("dbid:memory");
    });
  });
});
