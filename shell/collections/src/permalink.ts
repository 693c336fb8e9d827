import { getString, getStringList, type ContentItem } from "@folio/content";
import { ConfigError, dayOfYear, isMarkdownExtension, slugify } from "@folio/utils";

/**
 * Pattern for standalone pages; `index` files map to their directory
 */
export const PAGE_PERMALINK = "/:path/:basename:output_ext";

/**
 * Pattern for collection members without a configured permalink
 */
export const COLLECTION_PERMALINK = "/:collection/:path/:basename:output_ext";

export type PermalinkItem = Pick<
  ContentItem,
  "relativePath" | "frontMatter" | "collection" | "date" | "slug" | "extension"
>;

function pad(value: number, length = 2): string {
  return String(value).padStart(length, "0");
}

/**
 * Extension of the rendered file: Markdown becomes .html
 */
export function outputExtension(extension: string): string {
  return isMarkdownExtension(extension) ? ".html" : extension;
}

function splitPath(relativePath: string): { dir: string; basename: string } {
  const slash = relativePath.lastIndexOf("/");
  const name = relativePath.slice(slash + 1);
  const dot = name.lastIndexOf(".");
  return {
    dir: slash === -1 ? "" : relativePath.slice(0, slash),
    basename: dot > 0 ? name.slice(0, dot) : name,
  };
}

/**
 * Directory of an item below its collection directory (or the source root)
 */
function itemDirectory(item: PermalinkItem): string {
  const { dir } = splitPath(item.relativePath);
  const first = dir.split("/")[0] ?? "";
  if (first.startsWith("_")) {
    return dir.slice(first.length + 1);
  }
  return dir;
}

function firstSlug(...candidates: Array<string | undefined>): string {
  for (const candidate of candidates) {
    if (candidate !== undefined) {
      const slug = slugify(candidate);
      if (slug.length > 0) {
        return slug;
      }
    }
  }
  return "";
}

function placeholders(item: PermalinkItem): Record<string, string> {
  const { basename } = splitPath(item.relativePath);
  const frontMatter = item.frontMatter;
  const categories = [
    ...getStringList(frontMatter, "category"),
    ...getStringList(frontMatter, "categories"),
  ]
    .map((category) => slugify(category))
    .filter((category) => category.length > 0);

  const values: Record<string, string> = {
    name: firstSlug(getString(frontMatter, "name"), item.slug),
    title: firstSlug(
      getString(frontMatter, "slug"),
      getString(frontMatter, "title"),
      item.slug,
    ),
    slug: firstSlug(getString(frontMatter, "slug"), item.slug),
    path: itemDirectory(item),
    basename,
    collection: item.collection ?? "",
    categories: categories.join("/"),
    output_ext: outputExtension(item.extension),
  };

  const date = item.date;
  if (date) {
    values["year"] = String(date.getUTCFullYear());
    values["short_year"] = pad(date.getUTCFullYear() % 100);
    values["month"] = pad(date.getUTCMonth() + 1);
    values["i_month"] = String(date.getUTCMonth() + 1);
    values["day"] = pad(date.getUTCDate());
    values["i_day"] = String(date.getUTCDate());
    values["y_day"] = pad(dayOfYear(date), 3);
  } else {
    for (const key of ["year", "short_year", "month", "i_month", "day", "i_day", "y_day"]) {
      values[key] = "";
    }
  }

  return values;
}

/**
 * Resolve a permalink pattern for one item
 *
 * A front matter `permalink` replaces the pattern. Placeholders without a
 * value (`:categories` on an uncategorised post) leave an empty segment,
 * which collapses. Unknown placeholders stay as written.
 *
 * @example
 * resolvePermalink("/projects/:name", { frontMatter: { name: "demo" }, ... })
 * // "/projects/demo"
 */
export function resolvePermalink(pattern: string, item: PermalinkItem): string {
  const source = getString(item.frontMatter, "permalink") ?? pattern;
  const values = placeholders(item);

  let url = source.replace(/:([a-z_]+)/g, (match, key: string) => {
    const value = values[key];
    return value ?? match;
  });

  // Pages named index resolve to their directory
  if (item.collection === undefined && values["basename"] === "index") {
    url = url.replace(/\/index\.html$/, "/");
  }

  url = url.replace(/\/{2,}/g, "/");
  return url.startsWith("/") ? url : `/${url}`;
}

/**
 * Map a URL onto a file path inside the destination directory
 *
 * @example
 * toOutputPath("/")              // "index.html"
 * toOutputPath("/projects/demo") // "projects/demo/index.html"
 * toOutputPath("/feed.xml")      // "feed.xml"
 */
export function toOutputPath(url: string): string {
  const segments = url.split("/").map((segment) => {
    try {
      return decodeURIComponent(segment);
    } catch {
      throw new ConfigError(`Permalink "${url}" is not a valid URL path`, {
        url,
      });
    }
  });

  if (segments.some((segment) => segment === ".." || segment === ".")) {
    throw new ConfigError(`Permalink "${url}" leaves the output directory`, {
      url,
    });
  }

  const parts = segments.filter((segment) => segment.length > 0);
  const last = parts[parts.length - 1];
  if (url.endsWith("/") || last === undefined || !last.includes(".")) {
    parts.push("index.html");
  }
  return parts.join("/");
}
