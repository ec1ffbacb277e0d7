/**
 * Blog folder layout under the configured storage root
 */

export const BLOG_FOLDERS = ["posts", "drafts", "media", "templates", "config"] as const;

export type BlogFolder = (typeof BLOG_FOLDERS)[number];

/** Created beneath `media` by `initializeStructure` */
export const MEDIA_SUBFOLDERS = ["images", "videos"] as const;

export const MARKDOWN_EXTENSIONS = [".md", ".markdown"] as const;

export const DEFAULT_STORAGE_ROOT = "/BlogStorage";

export const isMarkdownFile = (name: string): boolean => {
  const lower = name.toLowerCase();
  return MARKDOWN_EXTENSIONS.some((ext) => lower.endsWith(ext));
};

/**
 * Join remote path segments, collapsing duplicate slashes.
 *
 * Example: joinPath("/BlogStorage/", "posts", "a.md") -> "/BlogStorage/posts/a.md"
 */
export const joinPath = (...segments: string[]): string => {
  const joined = segments
    .map((s) => s.replace(/^\/+|\/+$/g, ""))
    .filter((s) => s.length > 0)
    .join("/");
  return `/${joined}`;
};
