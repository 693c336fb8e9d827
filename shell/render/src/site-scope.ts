import type { ResolvedItem } from "@folio/collections";
import { toPageData } from "./page-data";
import type { SiteModel } from "./types";

const cache = new WeakMap<SiteModel, Record<string, unknown>>();

function groupData(
  groups: ReadonlyMap<string, readonly ResolvedItem[]>,
  site: SiteModel,
): Record<string, unknown> {
  return Object.fromEntries(
    [...groups].map(([name, items]) => [
      name,
      items.map((item) => toPageData(item, site)),
    ]),
  );
}

/**
 * The `site` object templates see
 *
 * Configuration keys come first; every collection is exposed under its
 * name (`site.posts`, `site.projects`) and `site.collections` lists them.
 */
export function createSiteScope(site: SiteModel): Record<string, unknown> {
  const cached = cache.get(site);
  if (cached) {
    return cached;
  }

  const collections = [...site.collections.values()].map((collection) => ({
    label: collection.name,
    output: collection.output,
    permalink: collection.permalink,
    docs: collection.items.map((item) => toPageData(item, site)),
  }));

  const scope: Record<string, unknown> = { ...site.config };
  for (const collection of collections) {
    scope[collection.label] = collection.docs;
  }
  Object.assign(scope, {
    collections,
    data: site.data,
    pages: site.pages.map((item) => toPageData(item, site)),
    tags: groupData(site.tags, site),
    categories: groupData(site.categories, site),
    navigation: site.navigation,
    time: site.time,
    environment: site.config.environment,
  });

  cache.set(site, scope);
  return scope;
}
