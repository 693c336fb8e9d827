import type { ItemSummary, ResolvedItem } from "@folio/collections";
import { getString } from "@folio/content";
import { extractExcerpt, isMarkdownExtension, markdownToHtml } from "@folio/utils";
import type { SiteModel } from "./types";

/**
 * First paragraph of an item's body, converted like the body
 * A front matter `excerpt` wins.
 */
export function buildExcerpt(item: Pick<ResolvedItem, "frontMatter" | "body" | "extension">): string {
  const explicit = getString(item.frontMatter, "excerpt");
  if (explicit !== undefined) {
    return explicit;
  }
  const paragraph = extractExcerpt(item.body);
  if (paragraph.length === 0) {
    return "";
  }
  return isMarkdownExtension(item.extension)
    ? markdownToHtml(paragraph).trim()
    : paragraph;
}

/**
 * The excerpt rendered with template substitution when the builder
 * provided one, the plain first paragraph otherwise
 */
export function excerptFor(
  item: Pick<ResolvedItem, "relativePath" | "frontMatter" | "body" | "extension">,
  site?: Pick<SiteModel, "excerpts">,
): string {
  return site?.excerpts?.get(item.relativePath) ?? buildExcerpt(item);
}

function summaryData(summary: ItemSummary | undefined): Record<string, unknown> | null {
  if (!summary) {
    return null;
  }
  return {
    url: summary.url,
    title: summary.title ?? null,
    date: summary.date ?? null,
    path: summary.relativePath,
  };
}

/**
 * The `page` object templates see for an item
 */
export function toPageData(
  item: ResolvedItem,
  site?: Pick<SiteModel, "excerpts">,
): Record<string, unknown> {
  return {
    ...item.frontMatter,
    url: item.url,
    id: item.url,
    path: item.relativePath,
    slug: item.slug,
    date: item.date ?? null,
    collection: item.collection ?? null,
    draft: item.draft,
    excerpt: excerptFor(item, site),
    previous: summaryData(item.previous),
    next: summaryData(item.next),
  };
}
