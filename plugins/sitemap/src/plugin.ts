import type { ResolvedItem } from "@folio/collections";
import { absoluteUrl } from "@folio/render";
import type {
  GeneratedFile,
  PluginContext,
  SitePlugin,
} from "@folio/site-builder";
import { toDate } from "@folio/utils";
import { generateRobotsTxt } from "./robots-generator";
import { generateSitemap, type SitemapEntry } from "./sitemap-generator";

export const SITEMAP_PATH = "sitemap.xml";
export const ROBOTS_PATH = "robots.txt";

function lastModified(item: ResolvedItem): Date | undefined {
  return toDate(item.frontMatter["last_modified_at"]) ?? item.date;
}

/**
 * Lists every rendered HTML page in sitemap.xml and points robots.txt at it
 *
 * Pages opt out with `sitemap: false`. A robots.txt in the source tree is
 * left alone.
 */
export class SitemapPlugin implements SitePlugin {
  readonly name = "sitemap";
  readonly aliases = ["jekyll-sitemap"];

  generate(context: PluginContext): GeneratedFile[] {
    const { config, logger } = context;
    const urls = { url: config.url, baseurl: config.baseurl };

    if (!config.url) {
      logger.warn("Site url is not set; sitemap locations will be relative");
    }

    const entries: SitemapEntry[] = [];
    context.pages.forEach((page, index) => {
      const item = context.items[index];
      if (!item || item.frontMatter["sitemap"] === false) {
        return;
      }
      if (!page.outputPath.endsWith(".html")) {
        return;
      }
      entries.push({
        loc: absoluteUrl(page.url, urls),
        lastmod: lastModified(item),
      });
    });

    const files: GeneratedFile[] = [
      { path: SITEMAP_PATH, content: generateSitemap(entries) },
    ];
    logger.info(`Generated ${SITEMAP_PATH} with ${entries.length} URLs`);

    const hasRobots =
      context.staticFiles.some((file) => file.relativePath === ROBOTS_PATH) ||
      context.pages.some((page) => page.outputPath === ROBOTS_PATH);
    if (hasRobots) {
      logger.debug(`Keeping the site's own ${ROBOTS_PATH}`);
    } else {
      files.push({
        path: ROBOTS_PATH,
        content: generateRobotsTxt(absoluteUrl(`/${SITEMAP_PATH}`, urls)),
      });
    }

    return files;
  }
}

export function sitemapPlugin(): SitemapPlugin {
  return new SitemapPlugin();
}
