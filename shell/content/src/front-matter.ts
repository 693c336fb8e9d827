import matter from "gray-matter";
import {
  ContentParseError,
  getErrorMessage,
  isPlainRecord,
  parseError,
} from "@folio/utils";
import type { FrontMatter } from "./types";

const FRONT_MATTER_START = /^---[ \t]*\r?\n/;

export interface ParsedFrontMatter {
  frontMatter: FrontMatter;
  body: string;
}

/**
 * Whether text opens with a front matter delimiter line
 */
export function hasFrontMatter(raw: string): boolean {
  return FRONT_MATTER_START.test(raw.replace(/^\uFEFF/, ""));
}

/**
 * Split a file into its front matter mapping and body
 *
 * Returns null when the file has no front matter block. The body is
 * returned exactly as written after the closing delimiter.
 *
 * @throws ContentParseError for malformed YAML or a non-mapping block
 */
export function parseFrontMatter(
  raw: string,
  relativePath: string,
): ParsedFrontMatter | null {
  const text = raw.replace(/^\uFEFF/, "");
  if (!hasFrontMatter(text)) {
    return null;
  }

  let data: unknown;
  let content: string;
  try {
    // Passing options bypasses gray-matter's input cache
    const parsed = matter(text, { excerpt: false });
    data = parsed.data;
    content = parsed.content;
  } catch (error) {
    throw new ContentParseError(
      parseError(relativePath, "front matter", getErrorMessage(error)),
      relativePath,
    );
  }

  if (data === null || data === undefined) {
    return { frontMatter: {}, body: content };
  }

  if (!isPlainRecord(data)) {
    throw new ContentParseError(
      parseError(relativePath, "front matter", "expected a mapping"),
      relativePath,
    );
  }

  return { frontMatter: { ...data }, body: content };
}

/**
 * Read a string list from a front matter field
 * Accepts a YAML list or a space-separated string ("tags: java spring")
 */
export function getStringList(frontMatter: FrontMatter, key: string): string[] {
  const value = frontMatter[key];
  if (Array.isArray(value)) {
    return value
      .filter(
        (entry): entry is string | number =>
          typeof entry === "string" || typeof entry === "number",
      )
      .map((entry) => String(entry).trim())
      .filter((entry) => entry.length > 0);
  }
  if (typeof value === "string") {
    return value.split(/\s+/).filter((entry) => entry.length > 0);
  }
  if (typeof value === "number") {
    return [String(value)];
  }
  return [];
}

/**
 * Read a string from a front matter field, numbers included
 */
export function getString(
  frontMatter: FrontMatter,
  key: string,
): string | undefined {
  const value = frontMatter[key];
  if (typeof value === "string") {
    return value;
  }
  if (typeof value === "number") {
    return String(value);
  }
  return undefined;
}
