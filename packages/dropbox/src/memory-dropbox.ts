/**
 * In-memory RemoteFileGateway
 *
 * Mirrors the Dropbox semantics the blog core depends on: case-insensitive
 * paths, 409-style error codes, overwrite uploads that create missing parent
 * folders, paginated listings. Useful for testing and local development.
 */

import {
  type AccountInfo,
  ALREADY_EXISTS,
  createGatewayError,
  type FileMetadata,
  type GatewayError,
  type GatewayErrorCode,
  type GatewayResult,
  type ListFolderResult,
  NOT_FOUND,
} from "@folio/protocol";
import type { GatewayOperation, RemoteFileGateway } from "./types.ts";

// ============================================================================
// Types
// ============================================================================

export type MemoryDropboxConfig = {
  /** Initial files: display path → UTF-8 text or bytes */
  files?: Record<string, string | Uint8Array>;
  /** Initial (empty) folders */
  folders?: string[];
  /** Entries per listing page (default: unlimited) */
  pageSize?: number;
  /** Clock used for `server_modified` (default: Date.now) */
  now?: () => number;
};

type MemoryFile = {
  displayPath: string;
  content: Uint8Array;
  modifiedAt: number;
};

export type MemoryDropboxCall = { method: GatewayOperation; arg: string };

export type MemoryDropbox = RemoteFileGateway & {
  /** Every gateway call in order */
  calls: MemoryDropboxCall[];
  /** Display paths of all stored files, sorted */
  files: () => string[];
  /** Display paths of all folders, sorted */
  folders: () => string[];
  readText: (path: string) => string | null;
  writeText: (path: string, text: string) => void;
  /**
   * Make the next `times` calls of `method` fail with `code` before
   * touching any state.
   */
  failNext: (method: GatewayOperation, code: GatewayErrorCode, times?: number) => void;
};

// ============================================================================
// Helpers
// ============================================================================

const encoder = new TextEncoder();
const decoder = new TextDecoder();

const normalize = (path: string): string => {
  const trimmed = path.replace(/\/+$/, "");
  return trimmed.toLowerCase();
};

const parentOf = (lowerPath: string): string => {
  const idx = lowerPath.lastIndexOf("/");
  return idx <= 0 ? "" : lowerPath.slice(0, idx);
};

const baseName = (path: string): string => path.slice(path.lastIndexOf("/") + 1);

const notFound = (path: string): GatewayError =>
  createGatewayError(NOT_FOUND, `path/not_found/ ${path}`, 409);

// ============================================================================
// Factory
// ============================================================================

export const createMemoryDropbox = (config: MemoryDropboxConfig = {}): MemoryDropbox => {
  const { pageSize = Number.POSITIVE_INFINITY, now = Date.now } = config;

  const fileMap = new Map<string, MemoryFile>();
  /** lower path → display path; "" is the root */
  const folderMap = new Map<string, string>([["", ""]]);
  const failures = new Map<GatewayOperation, { code: GatewayErrorCode; times: number }>();
  const calls: MemoryDropboxCall[] = [];

  const ensureFolders = (displayPath: string): void => {
    const parts = displayPath.split("/").filter((p) => p.length > 0);
    let current = "";
    for (const part of parts) {
      current = `${current}/${part}`;
      const lower = current.toLowerCase();
      if (!folderMap.has(lower)) folderMap.set(lower, current);
    }
  };

  const fileMetadata = (file: MemoryFile): FileMetadata => ({
    ".tag": "file",
    name: baseName(file.displayPath),
    path_lower: file.displayPath.toLowerCase(),
    path_display: file.displayPath,
    size: file.content.byteLength,
    server_modified: new Date(file.modifiedAt).toISOString(),
  });

  const folderMetadata = (displayPath: string): FileMetadata => ({
    ".tag": "folder",
    name: baseName(displayPath),
    path_lower: displayPath.toLowerCase(),
    path_display: displayPath,
  });

  const writeFile = (path: string, content: Uint8Array): MemoryFile => {
    const lower = normalize(path);
    const existing = fileMap.get(lower);
    const displayPath = existing?.displayPath ?? path;
    ensureFolders(displayPath.slice(0, displayPath.lastIndexOf("/")));
    const file = { displayPath, content: new Uint8Array(content), modifiedAt: now() };
    fileMap.set(lower, file);
    return file;
  };

  /** Record the call and consume an injected failure, if any */
  const enter = (method: GatewayOperation, arg: string): GatewayError | null => {
    calls.push({ method, arg });
    const failure = failures.get(method);
    if (!failure) return null;
    failure.times--;
    if (failure.times <= 0) failures.delete(method);
    return createGatewayError(failure.code, `Injected ${failure.code} for ${method}`);
  };

  const page = (lowerFolder: string, offset: number): ListFolderResult => {
    const entries: FileMetadata[] = [];
    for (const [lower, display] of folderMap) {
      if (lower !== "" && parentOf(lower) === lowerFolder) entries.push(folderMetadata(display));
    }
    for (const [lower, file] of fileMap) {
      if (parentOf(lower) === lowerFolder) entries.push(fileMetadata(file));
    }
    entries.sort((a, b) => a.path_lower.localeCompare(b.path_lower));

    const end = offset + pageSize;
    return {
      entries: entries.slice(offset, end),
      cursor: `${end}:${lowerFolder}`,
      has_more: end < entries.length,
    };
  };

  for (const folder of config.folders ?? []) ensureFolders(folder);
  for (const [path, content] of Object.entries(config.files ?? {})) {
    writeFile(path, typeof content === "string" ? encoder.encode(content) : content);
  }

  return {
    calls,

    async testConnection(): Promise<GatewayResult<AccountInfo>> {
      const failed = enter("testConnection", "");
      if (failed) return { ok: false, error: failed };
      return {
        ok: true,
        data: { account_id: "dbid:memory", name: { display_name: "In-memory Dropbox" } },
      };
    },

    async listFolder(path): Promise<GatewayResult<ListFolderResult>> {
      const failed = enter("listFolder", path);
      if (failed) return { ok: false, error: failed };
      const lower = normalize(path);
      if (!folderMap.has(lower)) return { ok: false, error: notFound(path) };
      return { ok: true, data: page(lower, 0) };
    },

    async listFolderContinue(cursor): Promise<GatewayResult<ListFolderResult>> {
      const failed = enter("listFolderContinue", cursor);
      if (failed) return { ok: false, error: failed };
      const sep = cursor.indexOf(":");
      const offset = Number.parseInt(cursor.slice(0, sep), 10);
      const lower = cursor.slice(sep + 1);
      if (sep === -1 || Number.isNaN(offset) || !folderMap.has(lower)) {
        return { ok: false, error: createGatewayError(NOT_FOUND, "reset/", 409) };
      }
      return { ok: true, data: page(lower, offset) };
    },

    async downloadFile(path): Promise<GatewayResult<Uint8Array>> {
      const failed = enter("downloadFile", path);
      if (failed) return { ok: false, error: failed };
      const file = fileMap.get(normalize(path));
      if (!file) return { ok: false, error: notFound(path) };
      return { ok: true, data: new Uint8Array(file.content) };
    },

    async uploadFile(path, content): Promise<GatewayResult<FileMetadata>> {
      const failed = enter("uploadFile", path);
      if (failed) return { ok: false, error: failed };
      return { ok: true, data: fileMetadata(writeFile(path, content)) };
    },

    async deleteFile(path): Promise<GatewayResult<FileMetadata>> {
      const failed = enter("deleteFile", path);
      if (failed) return { ok: false, error: failed };
      const lower = normalize(path);

      const file = fileMap.get(lower);
      if (file) {
        fileMap.delete(lower);
        return { ok: true, data: fileMetadata(file) };
      }

      const folder = folderMap.get(lower);
      if (folder !== undefined && lower !== "") {
        for (const key of [...fileMap.keys()]) {
          if (key.startsWith(`${lower}/`)) fileMap.delete(key);
        }
        for (const key of [...folderMap.keys()]) {
          if (key === lower || key.startsWith(`${lower}/`)) folderMap.delete(key);
        }
        return { ok: true, data: folderMetadata(folder) };
      }

      return { ok: false, error: notFound(path) };
    },

    async createFolder(path): Promise<GatewayResult<FileMetadata>> {
      const failed = enter("createFolder", path);
      if (failed) return { ok: false, error: failed };
      const lower = normalize(path);
      if (folderMap.has(lower) || fileMap.has(lower)) {
        return {
          ok: false,
          error: createGatewayError(ALREADY_EXISTS, `path/conflict/folder/ ${path}`, 409),
        };
      }
      ensureFolders(path);
      return { ok: true, data: folderMetadata(folderMap.get(lower) ?? path) };
    },

    files: () => [...fileMap.values()].map((f) => f.displayPath).sort(),

    folders: () => [...folderMap.values()].filter((p) => p !== "").sort(),

    readText: (path) => {
      const file = fileMap.get(normalize(path));
      return file ? decoder.decode(file.content) : null;
    },

    writeText: (path, text) => {
      writeFile(path, encoder.encode(text));
    },

    failNext: (method, code, times = 1) => {
      failures.set(method, { code, times });
    },
  };
};
