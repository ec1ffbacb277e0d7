/**
 * Dropbox HTTP gateway
 *
 * Thin authenticated wrapper over the v2 HTTP API:
 *
 *   RPC endpoints     (api.dropboxapi.com)     JSON in, JSON out
 *   Content endpoints (content.dropboxapi.com) arguments in the
 *                                              `Dropbox-API-Arg` header,
 *                                              raw bytes in the body
 *
 * Responses are validated with zod before they reach the caller.
 *
 * @packageDocumentation
 */

import {
  type AccountInfo,
  AccountInfoSchema,
  createGatewayError,
  type FileMetadata,
  FileMetadataSchema,
  type GatewayResult,
  INVALID_RESPONSE,
  type ListFolderResult,
  ListFolderResultSchema,
  MetadataEnvelopeSchema,
} from "@folio/protocol";
import type { z } from "zod";
import { createErrorFromResponse, createNetworkError } from "./errors.ts";
import type { RemoteFileGateway } from "./types.ts";

// ============================================================================
// Types
// ============================================================================

export type DropboxClientConfig = {
  /** OAuth bearer token */
  accessToken: string;
  /** RPC host (default: https://api.dropboxapi.com) */
  apiBaseUrl?: string;
  /** Content host (default: https://content.dropboxapi.com) */
  contentBaseUrl?: string;
  /** Custom fetch implementation (for testing) */
  fetch?: typeof fetch;
};

// ============================================================================
// Constants
// ============================================================================

export const DEFAULT_API_BASE_URL = "https://api.dropboxapi.com";
export const DEFAULT_CONTENT_BASE_URL = "https://content.dropboxapi.com";

// ============================================================================
// Helpers
// ============================================================================

/**
 * JSON for the `Dropbox-API-Arg` header. HTTP headers must be ASCII, so
 * every non-ASCII code unit is written as a \uXXXX escape.
 */
export const headerSafeJson = (value: unknown): string =>
  JSON.stringify(value).replace(
    /[\u007f-\uffff]/g,
    (c) => `\\u${c.charCodeAt(0).toString(16).padStart(4, "0")}`
  );

const parseBody = async <S extends z.ZodTypeAny>(
  response: Response,
  schema: S
): Promise<GatewayResult<z.infer<S>>> => {
  let json: unknown;
  try {
    json = await response.json();
  } catch (err) {
    return {
      ok: false,
      error: createGatewayError(INVALID_RESPONSE, "Response body is not JSON", response.status, err),
    };
  }

  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    const message = parsed.error.issues
      .map((i) => (i.path.length ? `${i.path.join(".")}: ${i.message}` : i.message))
      .join("; ");
    return {
      ok: false,
      error: createGatewayError(INVALID_RESPONSE, message, response.status, json),
    };
  }
  return { ok: true, data: parsed.data };
};

// ============================================================================
// Factory
// ============================================================================

export const createDropboxClient = (config: DropboxClientConfig): RemoteFileGateway => {
  const {
    accessToken,
    apiBaseUrl = DEFAULT_API_BASE_URL,
    contentBaseUrl = DEFAULT_CONTENT_BASE_URL,
    fetch: fetchFn = globalThis.fetch,
  } = config;

  const authHeader = `Bearer ${accessToken}`;

  /**
   * Send a request and hand back the response, or a gateway error for
   * transport failures and non-2xx statuses.
   */
  const send = async (url: string, init: RequestInit): Promise<GatewayResult<Response>> => {
    let response: Response;
    try {
      response = await fetchFn(url, init);
    } catch (err) {
      return { ok: false, error: createNetworkError(err) };
    }
    if (!response.ok) {
      return { ok: false, error: await createErrorFromResponse(response) };
    }
    return { ok: true, data: response };
  };

  /**
   * Call an RPC endpoint. `body` undefined means no body and no
   * Content-Type, which is what argument-less endpoints expect.
   */
  const rpc = async <S extends z.ZodTypeAny>(
    endpoint: string,
    body: unknown,
    schema: S
  ): Promise<GatewayResult<z.infer<S>>> => {
    const headers: Record<string, string> = { Authorization: authHeader };
    if (body !== undefined) {
      headers["Content-Type"] = "application/json";
    }

    const sent = await send(`${apiBaseUrl}/2/${endpoint}`, {
      method: "POST",
      headers,
      body: body !== undefined ? JSON.stringify(body) : undefined,
    });
    if (!sent.ok) return sent;
    return parseBody(sent.data, schema);
  };

  const unwrapMetadata = async (
    result: Promise<GatewayResult<z.infer<typeof MetadataEnvelopeSchema>>>
  ): Promise<GatewayResult<FileMetadata>> => {
    const r = await result;
    return r.ok ? { ok: true, data: r.data.metadata } : r;
  };

  return {
    testConnection: (): Promise<GatewayResult<AccountInfo>> =>
      rpc("users/get_current_account", undefined, AccountInfoSchema),

    listFolder: (path: string): Promise<GatewayResult<ListFolderResult>> =>
      rpc(
        "files/list_folder",
        {
          path,
          recursive: false,
          include_media_info: false,
          include_deleted: false,
        },
        ListFolderResultSchema
      ),

    listFolderContinue: (cursor: string): Promise<GatewayResult<ListFolderResult>> =>
      rpc("files/list_folder/continue", { cursor }, ListFolderResultSchema),

    async downloadFile(path: string): Promise<GatewayResult<Uint8Array>> {
      const sent = await send(`${contentBaseUrl}/2/files/download`, {
        method: "POST",
        headers: {
          Authorization: authHeader,
          "Dropbox-API-Arg": headerSafeJson({ path }),
        },
      });
      if (!sent.ok) return sent;

      try {
        const buffer = await sent.data.arrayBuffer();
        return { ok: true, data: new Uint8Array(buffer) };
      } catch (err) {
        return { ok: false, error: createNetworkError(err) };
      }
    },

    async uploadFile(path: string, content: Uint8Array): Promise<GatewayResult<FileMetadata>> {
      const sent = await send(`${contentBaseUrl}/2/files/upload`, {
        method: "POST",
        headers: {
          Authorization: authHeader,
          "Content-Type": "application/octet-stream",
          "Dropbox-API-Arg": headerSafeJson({ path, mode: "overwrite", autorename: false }),
        },
        body: content,
      });
      if (!sent.ok) return sent;
      return parseBody(sent.data, FileMetadataSchema);
    },

    deleteFile: (path: string): Promise<GatewayResult<FileMetadata>> =>
      unwrapMetadata(rpc("files/delete_v2", { path }, MetadataEnvelopeSchema)),

    createFolder: (path: string): Promise<GatewayResult<FileMetadata>> =>
      unwrapMetadata(rpc("files/create_folder_v2", { path, autorename: false }, MetadataEnvelopeSchema)),
  };
};
