import type { ContentItem } from "@folio/content";

/**
 * Build a content item from the fields a test cares about
 */
export function makeItem(
  relativePath: string,
  overrides: Partial<ContentItem> = {},
): ContentItem {
  const name = relativePath.slice(relativePath.lastIndexOf("/") + 1);
  const stem = name.replace(/\.[^.]+$/, "");
  return {
    relativePath,
    kind: overrides.collection ? "document" : "page",
    frontMatter: {},
    body: "",
    extension: name.slice(name.lastIndexOf(".")),
    slug: stem.replace(/^\d{4}-\d{2}-\d{2}-/, ""),
    draft: false,
    ...overrides,
  };
}
