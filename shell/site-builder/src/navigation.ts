import type { ResolvedItem } from "@folio/collections";
import type { SiteConfig } from "@folio/config";
import { getString } from "@folio/content";
import { relativeUrl, type NavigationItem } from "@folio/render";
import { matchesAnyGlob } from "@folio/utils";

function weightOf(item: ResolvedItem): number {
  const value = item.frontMatter["weight"];
  if (typeof value === "number" && Number.isFinite(value)) {
    return value;
  }
  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : 0;
  }
  return 0;
}

/**
 * Navigation bar entries: titled pages outside `nav_exclude`, ordered by
 * weight then label
 *
 * `nav_exclude` entries are relative paths or globs; a page can also opt
 * out with `nav_exclude: true` in its front matter.
 */
export function buildNavigation(
  pages: readonly ResolvedItem[],
  config: SiteConfig,
): NavigationItem[] {
  const items: NavigationItem[] = [];

  for (const page of pages) {
    const label = getString(page.frontMatter, "title");
    if (!label || page.frontMatter["nav_exclude"] === true) {
      continue;
    }
    if (matchesAnyGlob(page.relativePath, config.nav_exclude)) {
      continue;
    }
    items.push({
      label,
      href: relativeUrl(page.url, config.baseurl),
      weight: weightOf(page),
    });
  }

  return items.sort((a, b) => {
    if (a.weight !== b.weight) {
      return a.weight - b.weight;
    }
    return a.label < b.label ? -1 : a.label > b.label ? 1 : 0;
  });
}
