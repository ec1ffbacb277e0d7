/**
 * Thrown when a frontmatter block is not valid YAML or is not a mapping.
 * `cause` carries the YAML parser's error when there is one.
 */
export class FrontmatterParseError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "FrontmatterParseError";
  }
}
