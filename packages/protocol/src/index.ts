/**
 * @folio/protocol
 *
 * Shared data model, wire schemas and error codes.
 *
 * @packageDocumentation
 */

// ============================================================================
// Dropbox wire schemas
// ============================================================================

export type { AccountInfo, DropboxErrorBody, FileMetadata, ListFolderResult } from "./dropbox.ts";
export {
  AccountInfoSchema,
  DropboxErrorBodySchema,
  FileMetadataSchema,
  ListFolderResultSchema,
  MetadataEnvelopeSchema,
} from "./dropbox.ts";

// ============================================================================
// Errors
// ============================================================================

export type {
  GatewayError,
  GatewayErrorCode,
  GatewayResult,
  StoreErrorCode,
} from "./errors.ts";
export {
  ALREADY_EXISTS,
  AUTH_ERROR,
  createGatewayError,
  GatewayErrorCodeSchema,
  INVALID_RESPONSE,
  INVALID_SLUG,
  isTransientError,
  NETWORK_ERROR,
  NOT_FOUND,
  QUOTA_EXCEEDED,
  UNKNOWN,
} from "./errors.ts";

// ============================================================================
// Folder layout
// ============================================================================

export type { BlogFolder } from "./folders.ts";
export {
  BLOG_FOLDERS,
  DEFAULT_STORAGE_ROOT,
  isMarkdownFile,
  joinPath,
  MARKDOWN_EXTENSIONS,
  MEDIA_SUBFOLDERS,
} from "./folders.ts";

// ============================================================================
// Posts
// ============================================================================

export type { Logger } from "./logger.ts";
export type { BlogStats, PostMetadata, StoredPost } from "./post.ts";
export { generateSlug, isValidSlug, SLUG_REGEX, SlugSchema } from "./post.ts";
