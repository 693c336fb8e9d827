import { join, resolve } from "path";
import {
  CollectionAggregator,
  type ResolvedItem,
} from "@folio/collections";
import {
  loadConfig,
  mergeConfig,
  validateConfig,
  type SiteConfig,
} from "@folio/config";
import { ContentScanner } from "@folio/content";
import {
  PageRenderer,
  type RenderContext,
  type RenderedPage,
  type SiteModel,
} from "@folio/render";
import {
  ConfigError,
  Logger,
  ProgressReporter,
  duplicateError,
  type ZodOutput,
} from "@folio/utils";
import { buildNavigation } from "./navigation";
import {
  cleanDestination,
  copyStaticFile,
  writeOutputFile,
} from "./output-writer";
import { PluginRegistry } from "./plugin-registry";
import { groupByTerms } from "./taxonomy";
import {
  SiteBuilderOptionsSchema,
  type BuildOutput,
  type BuildResult,
  type GeneratedFile,
  type PluginContext,
  type SiteBuilderOptions,
  type SitePlugin,
} from "./types";

export interface SiteBuilderDeps {
  logger?: Logger;
  /** Generator plugins available to `plugins` in the settings */
  plugins?: PluginRegistry | readonly SitePlugin[];
}

type ParsedOptions = ZodOutput<typeof SiteBuilderOptionsSchema>;

interface PlannedOutput {
  path: string;
  source: BuildOutput["source"];
  /** Source file or plugin that produced the output */
  origin: string;
}

/**
 * Runs a complete build: settings, content scan, collections, rendering,
 * generator plugins, then the destination tree
 *
 * Everything is rendered in memory before the destination is touched, so
 * a failing build leaves the previous output in place.
 */
export class SiteBuilder {
  private readonly logger: Logger;
  private readonly plugins: PluginRegistry;

  public static createFresh(deps: SiteBuilderDeps = {}): SiteBuilder {
    return new SiteBuilder(deps);
  }

  constructor(deps: SiteBuilderDeps = {}) {
    const logger = deps.logger ?? Logger.getInstance();
    this.logger = logger.child("SiteBuilder");
    this.plugins =
      deps.plugins instanceof PluginRegistry
        ? deps.plugins
        : PluginRegistry.createFresh(logger, deps.plugins ?? []);
  }

  /**
   * @throws ConfigError, ContentParseError (strict front matter),
   * TemplateResolutionError or SiteBuildError; nothing is written when
   * rendering fails
   */
  async build(options: SiteBuilderOptions = {}): Promise<BuildResult> {
    const parsed = SiteBuilderOptionsSchema.parse(options);
    const reporter = ProgressReporter.from(options.onProgress);
    const now = parsed.now ?? new Date();
    const warnings: string[] = [];

    await reporter?.report({ message: "Loading settings", progress: 0, total: 100 });
    const config = await this.resolveConfig(options.config, parsed);
    const sourceDir = resolve(parsed.source ?? config.source);
    const destination = resolve(sourceDir, config.destination);
    this.logger.info(`Building ${sourceDir} into ${destination}`);

    await reporter?.report({ message: "Scanning content", progress: 10, total: 100 });
    const scan = await new ContentScanner({ logger: this.logger }).scan(
      sourceDir,
      config,
      { now },
    );

    await reporter?.report({ message: "Aggregating collections", progress: 30, total: 100 });
    const aggregation = CollectionAggregator.fromConfig(
      config,
      this.logger,
    ).aggregate(scan.items);
    for (const dropped of aggregation.dropped) {
      warnings.push(`${dropped.relativePath}: ${dropped.reason}`);
    }

    const posts = aggregation.collections.get("posts")?.items ?? [];
    const renderer = new PageRenderer({ config, logger: this.logger });
    const plainSite: SiteModel = {
      config,
      data: scan.data,
      collections: aggregation.collections,
      pages: aggregation.pages,
      tags: groupByTerms(posts, ["tags"]),
      categories: groupByTerms(posts, ["category", "categories"]),
      navigation: buildNavigation(aggregation.pages, config),
      time: now,
    };
    const excerpts = renderer.renderExcerpts(
      [
        ...[...aggregation.collections.values()].flatMap((collection) => collection.items),
        ...aggregation.pages,
      ],
      { site: plainSite, layouts: scan.layouts, includes: scan.includes },
    );
    const site: SiteModel = { ...plainSite, excerpts };
    const context: RenderContext = {
      site,
      layouts: scan.layouts,
      includes: scan.includes,
    };

    const items: ResolvedItem[] = [
      ...[...aggregation.collections.values()]
        .filter((collection) => collection.output)
        .flatMap((collection) => collection.items),
      ...aggregation.pages,
    ];

    const rendering = reporter?.createSub({ scale: { start: 40, end: 80 } });
    const pages: RenderedPage[] = [];
    for (const item of items) {
      pages.push(renderer.render(item, context));
      await rendering?.report({
        message: `Rendered ${item.relativePath}`,
        progress: pages.length,
        total: items.length,
      });
    }

    const planned = new Map<string, PlannedOutput>();
    for (const page of pages) {
      planned.set(page.outputPath, {
        path: page.outputPath,
        source: "page",
        origin: page.relativePath,
      });
    }
    for (const file of scan.staticFiles) {
      const existing = planned.get(file.relativePath);
      if (existing) {
        throw new ConfigError(
          duplicateError(file.relativePath, "output path", existing.origin, file.relativePath),
          { outputPath: file.relativePath },
        );
      }
      planned.set(file.relativePath, {
        path: file.relativePath,
        source: "static",
        origin: file.relativePath,
      });
    }

    await reporter?.report({ message: "Running plugins", progress: 85, total: 100 });
    const generated = await this.runPlugins(
      {
        config,
        site,
        items,
        pages,
        staticFiles: scan.staticFiles,
        sourceDir,
        logger: this.logger,
      },
      planned,
      warnings,
    );

    await reporter?.report({ message: "Writing output", progress: 90, total: 100 });
    if (parsed.cleanBeforeBuild) {
      await cleanDestination(destination, sourceDir);
    }
    for (const page of pages) {
      await writeOutputFile(destination, page.outputPath, page.html);
    }
    for (const file of scan.staticFiles) {
      await copyStaticFile(destination, file);
    }
    for (const file of generated) {
      await writeOutputFile(destination, file.path, file.content);
    }

    const result: BuildResult = {
      success: true,
      destination,
      pagesBuilt: pages.length,
      filesCopied: scan.staticFiles.length,
      generatedFiles: generated.length,
      errors: scan.errors.map((error) => error.message),
      warnings,
      dropped: aggregation.dropped,
      outputs: [...planned.values()].map(({ path, source }) => ({ path, source })),
    };

    await reporter?.report({ message: "Site build complete", progress: 100, total: 100 });
    this.logger.info(
      `Built ${result.pagesBuilt} pages, copied ${result.filesCopied} files, generated ${result.generatedFiles} files`,
    );
    return result;
  }

  private async resolveConfig(
    given: SiteConfig | undefined,
    parsed: ParsedOptions,
  ): Promise<SiteConfig> {
    if (given) {
      return parsed.overrides
        ? validateConfig(mergeConfig(given, parsed.overrides))
        : given;
    }
    const files = parsed.configFiles ?? [join(parsed.source ?? ".", "_config.yml")];
    return loadConfig(files, {
      ...(parsed.overrides ? { overrides: parsed.overrides } : {}),
      logger: this.logger,
    });
  }

  private async runPlugins(
    context: PluginContext,
    planned: Map<string, PlannedOutput>,
    warnings: string[],
  ): Promise<GeneratedFile[]> {
    const selection = this.plugins.select(context.config);

    for (const name of selection.unknown) {
      const message = `Plugin "${name}" is not available and was skipped`;
      this.logger.warn(message);
      warnings.push(message);
    }
    for (const plugin of selection.blocked) {
      const message = `Plugin "${plugin.name}" is not whitelisted and was skipped in safe mode`;
      this.logger.warn(message);
      warnings.push(message);
    }

    const generated: GeneratedFile[] = [];
    for (const plugin of selection.enabled) {
      const files = await plugin.generate({
        ...context,
        logger: context.logger.child(plugin.name),
      });
      for (const file of files) {
        const existing = planned.get(file.path);
        if (existing) {
          const message = `Plugin "${plugin.name}" did not write ${file.path}: already produced by ${existing.origin}`;
          this.logger.warn(message);
          warnings.push(message);
          continue;
        }
        planned.set(file.path, {
          path: file.path,
          source: "generated",
          origin: plugin.name,
        });
        generated.push(file);
      }
      this.logger.debug(`Plugin ${plugin.name} generated ${files.length} files`);
    }
    return generated;
  }
}
