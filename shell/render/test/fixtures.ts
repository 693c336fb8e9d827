import type { ResolvedItem } from "@folio/collections";
import { parseConfig } from "@folio/config";
import type { TemplateFile } from "@folio/content";
import type { RenderContext, SiteModel } from "../src";

export const BUILD_TIME = new Date("2024-06-01T00:00:00Z");

export function createSite(
  configYaml = "title: Test Site\n",
  overrides: Partial<SiteModel> = {},
): SiteModel {
  return {
    config: parseConfig(configYaml),
    data: {},
    collections: new Map(),
    pages: [],
    tags: new Map(),
    categories: new Map(),
    navigation: [],
    time: BUILD_TIME,
    ...overrides,
  };
}

export function resolvedItem(
  relativePath: string,
  overrides: Partial<ResolvedItem> = {},
): ResolvedItem {
  const name = relativePath.slice(relativePath.lastIndexOf("/") + 1);
  const stem = name.replace(/\.[^.]+$/, "");
  return {
    relativePath,
    kind: "page",
    frontMatter: {},
    body: "",
    extension: name.slice(name.lastIndexOf(".")),
    slug: stem,
    draft: false,
    url: `/${stem}/`,
    outputPath: `${stem}/index.html`,
    ...overrides,
  };
}

export function layout(
  name: string,
  body: string,
  frontMatter: Record<string, unknown> = {},
): [string, TemplateFile] {
  return [
    name,
    { name, relativePath: `_layouts/${name}.html`, frontMatter, body },
  ];
}

export function createContext(
  site: SiteModel,
  layouts: Array<[string, TemplateFile]> = [],
  includes: Record<string, string> = {},
): RenderContext {
  return {
    site,
    layouts: new Map(layouts),
    includes: new Map(Object.entries(includes)),
  };
}
