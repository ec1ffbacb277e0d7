/**
 * Dropbox wire schemas
 *
 * Only the fields the blog core reads are declared; everything else passes
 * through untouched.
 */

import { z } from "zod";

// ============================================================================
// File Metadata
// ============================================================================

export const FileMetadataSchema = z
  .object({
    ".tag": z.enum(["file", "folder", "deleted"]).optional(),
    name: z.string(),
    path_lower: z.string(),
    path_display: z.string(),
    size: z.number().optional(),
    content_hash: z.string().optional(),
    client_modified: z.string().optional(),
    server_modified: z.string().optional(),
  })
  .passthrough();

export type FileMetadata = z.infer<typeof FileMetadataSchema>;

export const ListFolderResultSchema = z.object({
  entries: z.array(FileMetadataSchema),
  cursor: z.string(),
  has_more: z.boolean(),
});

export type ListFolderResult = z.infer<typeof ListFolderResultSchema>;

/** delete_v2 and create_folder_v2 wrap the metadata */
export const MetadataEnvelopeSchema = z.object({
  metadata: FileMetadataSchema,
});

// ============================================================================
// Account
// ============================================================================

export const AccountInfoSchema = z
  .object({
    account_id: z.string(),
    email: z.string().optional(),
    name: z
      .object({
        display_name: z.string(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

export type AccountInfo = z.infer<typeof AccountInfoSchema>;

// ============================================================================
// Error Body
// ============================================================================

/**
 * Dropbox endpoint errors (HTTP 409) carry a machine-readable summary such
 * as "path/not_found/.." or "path/conflict/folder/..".
 */
export const DropboxErrorBodySchema = z
  .object({
    error_summary: z.string().optional(),
    error: z.unknown().optional(),
  })
  .passthrough();

export type DropboxErrorBody = z.infer<typeof DropboxErrorBodySchema>;
