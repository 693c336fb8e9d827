/**
 * Arbitrary key/value metadata from a file's front matter block
 */
export type FrontMatter = Record<string, unknown>;

/**
 * `page` for standalone pages, `document` for collection members
 */
export type ContentKind = "page" | "document";

/**
 * One page, post, draft or collection member discovered in the source tree
 */
export interface ContentItem {
  /** POSIX path relative to the source root, e.g. "_posts/2024-01-02-hello.md" */
  relativePath: string;
  kind: ContentKind;
  /** Front matter with configured defaults merged beneath it */
  frontMatter: FrontMatter;
  /** Raw content after the front matter block */
  body: string;
  /** Lower-cased file extension including the dot */
  extension: string;
  collection?: string | undefined;
  date?: Date | undefined;
  /** File name without date prefix and extension */
  slug: string;
  draft: boolean;
}

/**
 * A file copied verbatim to the destination
 */
export interface StaticFile {
  relativePath: string;
  sourcePath: string;
}

/**
 * A layout or include read from the source tree
 */
export interface TemplateFile {
  /** Lookup name: "page" for _layouts/page.html, "nav/links.html" for includes */
  name: string;
  relativePath: string;
  frontMatter: FrontMatter;
  body: string;
}
