import { mkdir, writeFile } from "fs/promises";
import { dirname, join } from "path";
import { outputExtension, type ResolvedItem } from "@folio/collections";
import type { SiteConfig } from "@folio/config";
import {
  Logger,
  TemplateResolutionError,
  isMarkdownExtension,
  markdownToHtml,
  extractExcerpt,
  notFoundError,
} from "@folio/utils";
import { buildExcerpt, toPageData } from "./page-data";
import { createSiteScope } from "./site-scope";
import { hasTemplateSyntax } from "./template/parser";
import {
  createDefaultFilters,
  type FilterRegistry,
} from "./template/filters";
import {
  TemplateEngine,
  type IncludeSource,
  type TemplateScope,
} from "./template/engine";
import { BUILTIN_INCLUDES, BUILTIN_LAYOUTS } from "./theme";
import type { RenderContext, RenderedPage } from "./types";

export interface PageRendererOptions {
  config: SiteConfig;
  logger?: Logger;
  filters?: FilterRegistry;
}

const NO_LAYOUT = new Set(["none", "null", ""]);

/**
 * Layout named by front matter; null when the item asks for none
 *
 * Only HTML output gets the implicit `default` layout.
 */
export function layoutNameFor(item: ResolvedItem): string | null {
  const value = item.frontMatter["layout"];
  if (value === undefined) {
    return outputExtension(item.extension) === ".html" ? "default" : null;
  }
  if (value === null || value === false) {
    return null;
  }
  const name = String(value).trim();
  return NO_LAYOUT.has(name) ? null : name.replace(/\.html$/, "");
}

/**
 * Renders content items: template substitution, Markdown conversion,
 * then the layout chain
 */
export class PageRenderer {
  private readonly logger: Logger;
  private readonly config: SiteConfig;
  private readonly filters: FilterRegistry;
  private readonly engines = new WeakMap<RenderContext, TemplateEngine>();

  constructor(options: PageRendererOptions) {
    this.logger = (options.logger ?? Logger.getInstance()).child("PageRenderer");
    this.config = options.config;
    this.filters = options.filters ?? createDefaultFilters();
  }

  /**
   * @throws TemplateResolutionError under strict settings, for unknown
   * tags, layout cycles and runaway includes
   */
  render(item: ResolvedItem, context: RenderContext): RenderedPage {
    const warnings: string[] = [];
    const engine = this.createEngine(context);
    const page = toPageData(item, context.site);
    const site = createSiteScope(context.site);

    let content = engine.render(item.body, { site, page }, {
      name: item.relativePath,
      warnings,
    });
    if (isMarkdownExtension(item.extension)) {
      content = markdownToHtml(content);
    }
    page["content"] = content;

    const html = this.applyLayouts(item, content, context, engine, { site, page }, warnings);

    if (warnings.length > 0) {
      this.logger.warn(`${item.relativePath}: ${[...new Set(warnings)].join("; ")}`);
    }

    return {
      relativePath: item.relativePath,
      url: item.url,
      outputPath: item.outputPath,
      content,
      html,
    };
  }

  /**
   * Excerpts of items whose first paragraph uses template syntax, taken
   * from the substituted body; other items keep their plain excerpt
   *
   * Warnings are left to `render`, which reports them once per item.
   */
  renderExcerpts(
    items: readonly ResolvedItem[],
    context: RenderContext,
  ): Map<string, string> {
    const engine = this.createEngine(context);
    const site = createSiteScope(context.site);
    const excerpts = new Map<string, string>();

    for (const item of items) {
      if (
        item.frontMatter["excerpt"] !== undefined ||
        !hasTemplateSyntax(extractExcerpt(item.body))
      ) {
        continue;
      }
      const body = engine.render(
        item.body,
        { site, page: toPageData(item, context.site) },
        { name: item.relativePath, warnings: [] },
      );
      excerpts.set(item.relativePath, buildExcerpt({ ...item, body }));
    }
    return excerpts;
  }

  private createEngine(context: RenderContext): TemplateEngine {
    const existing = this.engines.get(context);
    if (existing) {
      return existing;
    }
    const engine = new TemplateEngine({
      filters: this.filters,
      filterContext: { url: this.config.url, baseurl: this.config.baseurl },
      strictVariables: this.config.liquid.strict_variables,
      strictFilters: this.config.liquid.strict_filters,
      resolveInclude: (name): IncludeSource | undefined => {
        const text = context.includes.get(name);
        if (text !== undefined) {
          return { type: "template", name, text };
        }
        const builtin = BUILTIN_INCLUDES[name.replace(/\.html$/, "")];
        if (builtin) {
          return {
            type: "component",
            name,
            render: (_scope, params) => builtin(context.site, params),
          };
        }
        return undefined;
      },
    });
    this.engines.set(context, engine);
    return engine;
  }

  private applyLayouts(
    item: ResolvedItem,
    initial: string,
    context: RenderContext,
    engine: TemplateEngine,
    scope: TemplateScope,
    warnings: string[],
  ): string {
    let content = initial;
    let name = layoutNameFor(item);
    const visited: string[] = [];

    while (name !== null) {
      if (visited.includes(name)) {
        throw new TemplateResolutionError(
          `Layout cycle ${[...visited, name].join(" -> ")} in ${item.relativePath}`,
          { sourcePath: item.relativePath, layouts: [...visited, name] },
        );
      }
      visited.push(name);

      const user = context.layouts.get(name);
      if (user) {
        content = engine.render(
          user.body,
          { ...scope, content, layout: user.frontMatter },
          { name: user.relativePath, warnings },
        );
        const parent = user.frontMatter["layout"];
        name =
          typeof parent === "string" && !NO_LAYOUT.has(parent)
            ? parent.replace(/\.html$/, "")
            : null;
        continue;
      }

      const builtin = BUILTIN_LAYOUTS[name];
      if (builtin) {
        content = builtin.render({ site: context.site, page: item, content });
        name = builtin.parent ?? null;
        continue;
      }

      if (this.config.liquid.strict_variables) {
        throw new TemplateResolutionError(
          `${notFoundError(name, "Layout")} (used by ${item.relativePath})`,
          { sourcePath: item.relativePath, layout: name },
        );
      }
      warnings.push(`layout "${name}" not found`);
      name = null;
    }

    return content;
  }
}

/**
 * Write one rendered page below the destination directory
 *
 * @returns the absolute path written
 */
export async function writeRenderedPage(
  destination: string,
  page: RenderedPage,
): Promise<string> {
  const target = join(destination, ...page.outputPath.split("/"));
  await mkdir(dirname(target), { recursive: true });
  await writeFile(target, page.html, "utf-8");
  return target;
}
