/**
 * @folio/dropbox
 *
 * Remote file gateway over the Dropbox HTTP API, plus an in-memory
 * implementation with the same contract.
 */

export {
  createDropboxClient,
  DEFAULT_API_BASE_URL,
  DEFAULT_CONTENT_BASE_URL,
  type DropboxClientConfig,
  headerSafeJson,
} from "./client.ts";
export { createErrorFromResponse, createNetworkError, statusToErrorCode } from "./errors.ts";
export {
  createMemoryDropbox,
  type MemoryDropbox,
  type MemoryDropboxCall,
  type MemoryDropboxConfig,
} from "./memory-dropbox.ts";
export type { GatewayOperation, RemoteFileGateway } from "./types.ts";
