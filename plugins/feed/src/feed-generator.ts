import { escapeXml, toRFC822Date } from "@folio/utils";

/**
 * RSS feed configuration
 */
export interface RSSFeedConfig {
  title: string;
  description: string;
  /** Absolute URL of the site root */
  link: string;
  /** Absolute URL of the feed itself */
  feedUrl: string;
  language?: string | undefined;
  managingEditor?: string | undefined;
}

export interface FeedPost {
  title: string;
  /** Absolute URL */
  link: string;
  date: Date;
  /** Plain or HTML summary, escaped into `<description>` */
  excerpt: string;
  /** Rendered HTML body */
  content: string;
  author?: string | undefined;
  categories: readonly string[];
}

// "]]>" would end the CDATA section early
function toCData(html: string): string {
  return `<![CDATA[${html.replace(/]]>/g, "]]]]><![CDATA[>")}]]>`;
}

/**
 * Generate RSS 2.0 feed XML; posts are written in the given order
 *
 * `lastBuildDate` is the newest post date and is left out when there are
 * no posts.
 */
export function generateRSSFeed(
  posts: readonly FeedPost[],
  config: RSSFeedConfig,
): string {
  const newest = posts.reduce<Date | undefined>(
    (latest, post) =>
      latest === undefined || post.date > latest ? post.date : latest,
    undefined,
  );

  const items = posts
    .map((post) => {
      const categories = post.categories
        .map((category) => `\n      <category>${escapeXml(category)}</category>`)
        .join("");
      return `    <item>
      <title>${escapeXml(post.title)}</title>
      <link>${escapeXml(post.link)}</link>
      <guid isPermaLink="true">${escapeXml(post.link)}</guid>
      <description>${escapeXml(post.excerpt)}</description>
      <content:encoded>${toCData(post.content)}</content:encoded>${
        post.author ? `\n      <author>${escapeXml(post.author)}</author>` : ""
      }
      <pubDate>${toRFC822Date(post.date)}</pubDate>${categories}
    </item>`;
    })
    .join("\n");

  const lastBuildDateTag = newest
    ? `\n    <lastBuildDate>${toRFC822Date(newest)}</lastBuildDate>`
    : "";
  const managingEditorTag = config.managingEditor
    ? `\n    <managingEditor>${escapeXml(config.managingEditor)}</managingEditor>`
    : "";

  return `<?xml version="1.0" encoding="UTF-8"?>
<rss version="2.0" xmlns:atom="http://www.w3.org/2005/Atom" xmlns:content="http://purl.org/rss/1.0/modules/content/">
  <channel>
    <title>${escapeXml(config.title)}</title>
    <link>${escapeXml(config.link)}</link>
    <description>${escapeXml(config.description)}</description>
    <language>${escapeXml(config.language ?? "en-us")}</language>${lastBuildDateTag}
    <atom:link href="${escapeXml(config.feedUrl)}" rel="self" type="application/rss+xml"/>${managingEditorTag}
${items}${items ? "\n" : ""}  </channel>
</rss>
`;
}
