/**
 * Frontmatter block ⇄ PostMetadata
 *
 * Known keys map onto PostMetadata fields; every other key is kept in
 * `extra` and written back after the known ones.
 */

import { generateSlug, isValidSlug, MARKDOWN_EXTENSIONS, type PostMetadata } from "@folio/protocol";
import YAML from "yaml";
import { FrontmatterParseError } from "./errors.ts";

// ============================================================================
// Constants
// ============================================================================

/** Render order of the known keys */
export const METADATA_KEYS = [
  "title",
  "slug",
  "created_at",
  "updated_at",
  "category",
  "tags",
  "published",
  "author",
  "excerpt",
] as const;

const KNOWN_KEYS: ReadonlySet<string> = new Set(METADATA_KEYS);

const ISO_DATE = /^\d{4}-\d{2}-\d{2}/;

// ============================================================================
// Helpers
// ============================================================================

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const asString = (value: unknown): string | undefined =>
  typeof value === "string" ? value : undefined;

const asDate = (value: unknown): Date | undefined => {
  if (value instanceof Date) return Number.isNaN(value.getTime()) ? undefined : value;
  if (typeof value !== "string" || !ISO_DATE.test(value)) return undefined;
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? undefined : date;
};

const asTags = (value: unknown): string[] => {
  if (!Array.isArray(value)) return [];
  const tags: string[] = [];
  for (const item of value) {
    if (typeof item === "string" && !tags.includes(item)) tags.push(item);
  }
  return tags;
};

const pickSlug = (provided: string | undefined, title: string, fallbackTitle: string): string => {
  if (provided !== undefined && isValidSlug(provided)) return provided;
  const candidates = [provided ?? "", title, fallbackTitle];
  for (const candidate of candidates) {
    const slug = generateSlug(candidate);
    if (slug) return slug;
  }
  return "untitled";
};

/**
 * Post title implied by a file name: the base name without its markdown
 * extension.
 *
 * Example: "/BlogStorage/posts/hello-world.md" -> "hello-world"
 */
export const titleFromFileName = (name: string): string => {
  const base = name.slice(name.lastIndexOf("/") + 1);
  const lower = base.toLowerCase();
  const ext = MARKDOWN_EXTENSIONS.find((e) => lower.endsWith(e));
  return ext ? base.slice(0, -ext.length) : base;
};

// ============================================================================
// Parse
// ============================================================================

/**
 * Decode a frontmatter block into PostMetadata.
 *
 * Missing fields take defaults: title from `fallbackTitle`, slug generated
 * from the title, `created_at` = `now`, `updated_at` = `created_at`,
 * `published` = true.
 *
 * @throws FrontmatterParseError when the block is not a YAML mapping
 */
export const parseMetadata = (
  block: string,
  fallbackTitle: string,
  now: Date = new Date()
): PostMetadata => {
  let value: unknown;
  try {
    value = YAML.parse(block);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new FrontmatterParseError(`Invalid YAML frontmatter: ${reason}`, { cause: err });
  }

  // An empty block (or one holding only comments) parses to null
  const map = value ?? {};
  if (!isRecord(map)) {
    throw new FrontmatterParseError("Frontmatter must be a YAML mapping");
  }

  const title = asString(map.title) ?? fallbackTitle;
  const createdAt = asDate(map.created_at) ?? now;

  const extra: Record<string, unknown> = {};
  for (const [key, v] of Object.entries(map)) {
    if (!KNOWN_KEYS.has(key)) extra[key] = v;
  }

  const metadata: PostMetadata = {
    title,
    slug: pickSlug(asString(map.slug), title, fallbackTitle),
    createdAt,
    updatedAt: asDate(map.updated_at) ?? createdAt,
    tags: asTags(map.tags),
    published: typeof map.published === "boolean" ? map.published : true,
    extra,
  };

  const category = asString(map.category);
  if (category !== undefined) metadata.category = category;
  const author = asString(map.author);
  if (author !== undefined) metadata.author = author;
  const excerpt = asString(map.excerpt);
  if (excerpt !== undefined) metadata.excerpt = excerpt;

  return metadata;
};

// ============================================================================
// Render
// ============================================================================

/**
 * Encode PostMetadata as a YAML block (no delimiters, no trailing newline).
 * Known keys come first in METADATA_KEYS order; absent optionals are
 * omitted.
 */
export const renderMetadata = (metadata: PostMetadata): string => {
  // A Map keeps insertion order even for integer-like extra keys
  const fields = new Map<string, unknown>([
    ["title", metadata.title],
    ["slug", metadata.slug],
    ["created_at", metadata.createdAt.toISOString()],
    ["updated_at", metadata.updatedAt.toISOString()],
  ]);
  if (metadata.category !== undefined) fields.set("category", metadata.category);
  fields.set("tags", [...metadata.tags]);
  fields.set("published", metadata.published);
  if (metadata.author !== undefined) fields.set("author", metadata.author);
  if (metadata.excerpt !== undefined) fields.set("excerpt", metadata.excerpt);

  for (const [key, value] of Object.entries(metadata.extra)) {
    if (!KNOWN_KEYS.has(key) && value !== undefined) fields.set(key, value);
  }

  return YAML.stringify(fields).trimEnd();
};
