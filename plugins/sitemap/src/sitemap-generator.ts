import { escapeXml } from "@folio/utils";
import { toXmlSchemaDate } from "@folio/render";

export interface SitemapEntry {
  /** Absolute URL */
  loc: string;
  lastmod?: Date | undefined;
}

/**
 * Generate sitemap.xml content, one `<url>` per entry in the given order
 */
export function generateSitemap(entries: readonly SitemapEntry[]): string {
  const urlEntries = entries
    .map(
      (entry) => `  <url>
    <loc>${escapeXml(entry.loc)}</loc>${entry.lastmod ? `\n    <lastmod>${toXmlSchemaDate(entry.lastmod)}</lastmod>` : ""}
  </url>`,
    )
    .join("\n");

  return `<?xml version="1.0" encoding="UTF-8"?>
<urlset xmlns="http://www.sitemaps.org/schemas/sitemap/0.9">
${urlEntries}${urlEntries ? "\n" : ""}</urlset>
`;
}
