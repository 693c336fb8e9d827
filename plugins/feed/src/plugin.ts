import type { ResolvedItem } from "@folio/collections";
import { getString, getStringList } from "@folio/content";
import { absoluteUrl, excerptFor } from "@folio/render";
import type {
  GeneratedFile,
  PluginContext,
  SitePlugin,
} from "@folio/site-builder";
import { ConfigError, sortByKey, validationError, z } from "@folio/utils";
import { generateRSSFeed, type FeedPost } from "./feed-generator";

export const FEED_PATH = "feed.xml";

export const feedSettingsSchema = z
  .object({
    limit: z
      .number()
      .int()
      .positive()
      .default(20)
      .describe("Number of most recent posts in the feed"),
  })
  .passthrough()
  .default({});

export type FeedSettings = z.output<typeof feedSettingsSchema>;

/**
 * Writes feed.xml with the most recent posts, newest first
 */
export class FeedPlugin implements SitePlugin {
  readonly name = "feed";
  readonly aliases = ["jekyll-feed"];

  generate(context: PluginContext): GeneratedFile[] {
    const { config, site, logger } = context;
    const settings = this.parseSettings(context.config["feed"]);
    const urls = { url: config.url, baseurl: config.baseurl };

    const contentByPath = new Map(
      context.pages.map((page) => [page.relativePath, page.content]),
    );
    const dated = (site.collections.get("posts")?.items ?? []).filter(
      (post): post is ResolvedItem & { date: Date } => post.date !== undefined,
    );
    // posts may be sorted by another key through `sort_by`
    const posts = sortByKey(dated, (post) => post.date.getTime(), "desc")
      .slice(0, settings.limit)
      .map(
        (post): FeedPost => ({
          title: getString(post.frontMatter, "title") ?? post.slug,
          link: absoluteUrl(post.url, urls),
          date: post.date,
          excerpt: excerptFor(post, site),
          content: contentByPath.get(post.relativePath) ?? "",
          author: getString(post.frontMatter, "author") ?? config.author.name,
          categories: getStringList(post.frontMatter, "tags"),
        }),
      );

    const xml = generateRSSFeed(posts, {
      title: config.title,
      description: config.description,
      link: absoluteUrl("/", urls),
      feedUrl: absoluteUrl(`/${FEED_PATH}`, urls),
      language: typeof config["lang"] === "string" ? config["lang"] : undefined,
      managingEditor: config.author.email,
    });

    logger.info(`Generated ${FEED_PATH} with ${posts.length} posts`);
    return [{ path: FEED_PATH, content: xml }];
  }

  private parseSettings(raw: unknown): FeedSettings {
    const result = feedSettingsSchema.safeParse(raw);
    if (!result.success) {
      throw new ConfigError(
        validationError(
          "feed",
          result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; "),
        ),
      );
    }
    return result.data;
  }
}

export function feedPlugin(): FeedPlugin {
  return new FeedPlugin();
}
