import type { AccountInfo, FileMetadata, GatewayResult, ListFolderResult } from "@folio/protocol";

/**
 * File operations the blog core needs from the remote store.
 *
 * Every method resolves; failures come back as `{ ok: false, error }`.
 * Nothing retries internally.
 */
export type RemoteFileGateway = {
  testConnection: () => Promise<GatewayResult<AccountInfo>>;
  listFolder: (path: string) => Promise<GatewayResult<ListFolderResult>>;
  /** Next page of a listing whose previous page had `has_more` */
  listFolderContinue: (cursor: string) => Promise<GatewayResult<ListFolderResult>>;
  downloadFile: (path: string) => Promise<GatewayResult<Uint8Array>>;
  /** Overwrites any existing file at `path` */
  uploadFile: (path: string, content: Uint8Array) => Promise<GatewayResult<FileMetadata>>;
  deleteFile: (path: string) => Promise<GatewayResult<FileMetadata>>;
  createFolder: (path: string) => Promise<GatewayResult<FileMetadata>>;
};

export type GatewayOperation = keyof RemoteFileGateway;
