/**
 * Frontmatter splitting
 *
 * A document carries frontmatter when it starts with `---` and a later line
 * is exactly `---`:
 *
 *   ---
 *   title: Hello
 *   ---
 *
 *   Body text.
 */

export const DELIMITER = "---";

export type SplitDocument = {
  /** Text between the delimiters, or null when there is no frontmatter */
  frontmatter: string | null;
  body: string;
};

const stripCR = (line: string): string => (line.endsWith("\r") ? line.slice(0, -1) : line);

/**
 * Split a document into its frontmatter block and body.
 *
 * Documents without an opening delimiter, or whose block is never closed,
 * come back whole as the body. One blank line after the closing delimiter
 * belongs to the separator and is dropped from the body.
 */
export const splitFrontmatter = (document: string): SplitDocument => {
  if (!document.startsWith(DELIMITER)) {
    return { frontmatter: null, body: document };
  }

  const lines = document.split("\n");
  const close = lines.findIndex((line, i) => i > 0 && stripCR(line) === DELIMITER);
  if (close === -1) {
    return { frontmatter: null, body: document };
  }

  const frontmatter = lines.slice(1, close).map(stripCR).join("\n");
  const rest = lines.slice(close + 1);
  const first = rest[0];
  if (first !== undefined && stripCR(first) === "") {
    rest.shift();
  }
  return { frontmatter, body: rest.join("\n") };
};
