/**
 * Whole-document codec
 */

import type { PostMetadata } from "@folio/protocol";
import { parseMetadata, renderMetadata } from "./metadata.ts";
import { DELIMITER, splitFrontmatter } from "./split.ts";

export type ParsedDocument = {
  metadata: PostMetadata;
  body: string;
};

/**
 * Parse a stored document. Returns null when it has no frontmatter.
 *
 * @throws FrontmatterParseError when the frontmatter is malformed
 */
export const parseDocument = (
  document: string,
  fallbackTitle: string,
  now?: Date
): ParsedDocument | null => {
  const { frontmatter, body } = splitFrontmatter(document);
  if (frontmatter === null) return null;
  return { metadata: parseMetadata(frontmatter, fallbackTitle, now), body };
};

/**
 * Render a post as `---\n<yaml>\n---\n\n<body>`.
 */
export const renderDocument = (metadata: PostMetadata, body: string): string =>
  `${DELIMITER}\n${renderMetadata(metadata)}\n${DELIMITER}\n\n${body}`;
