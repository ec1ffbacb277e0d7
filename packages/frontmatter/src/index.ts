/**
 * @folio/frontmatter
 *
 * Pure codec between stored markdown documents and post metadata.
 */

export { type ParsedDocument, parseDocument, renderDocument } from "./document.ts";
export { FrontmatterParseError } from "./errors.ts";
export { METADATA_KEYS, parseMetadata, renderMetadata, titleFromFileName } from "./metadata.ts";
export { DELIMITER, type SplitDocument, splitFrontmatter } from "./split.ts";
