import { readdir, readFile } from "fs/promises";
import { extname, join, relative, resolve, sep } from "path";
import type { SiteConfig } from "@folio/config";
import {
  ContentParseError,
  Logger,
  isMarkdownExtension,
  matchesAnyGlob,
  parseError,
  toDate,
} from "@folio/utils";
import { loadDataFiles } from "./data-loader";
import { applyFrontMatterDefaults } from "./defaults";
import { getString, parseFrontMatter } from "./front-matter";
import type {
  ContentItem,
  FrontMatter,
  StaticFile,
  TemplateFile,
} from "./types";

/**
 * Paths never treated as site content
 */
export const DEFAULT_EXCLUDES = [
  "node_modules",
  "vendor",
  "Gemfile",
  "Gemfile.lock",
  ".sass-cache",
  ".jekyll-cache",
] as const;

const DATED_FILE_NAME = /^(\d{4})-(\d{2})-(\d{2})-(.+)$/;
const UTF8_BOM = Buffer.from([0xef, 0xbb, 0xbf]);
const DELIMITER = Buffer.from("---");

export interface ScanResult {
  /** Content items in discovery order */
  items: ContentItem[];
  staticFiles: StaticFile[];
  /** Layouts by name ("default" for _layouts/default.html) */
  layouts: Map<string, TemplateFile>;
  /** Include sources by file name relative to _includes */
  includes: Map<string, string>;
  data: Record<string, unknown>;
  /** Files left out because they failed to parse */
  errors: ContentParseError[];
  /** Items left out as unpublished or dated in the future */
  skipped: string[];
}

export interface ScanOptions {
  /** Build time used for draft dates and the future-post cut-off */
  now?: Date;
}

export interface ContentScannerOptions {
  logger?: Logger;
}

interface SourceFile {
  relativePath: string;
  absolutePath: string;
}

interface CollectionSource {
  collection: string;
  draft: boolean;
}

function byName(a: { name: string }, b: { name: string }): number {
  return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
}

function toPosix(path: string): string {
  return path.split(sep).join("/");
}

function fileStem(relativePath: string): string {
  const name = relativePath.slice(relativePath.lastIndexOf("/") + 1);
  const extension = extname(name);
  return extension ? name.slice(0, -extension.length) : name;
}

/**
 * Whether a raw file opens with a front matter delimiter
 */
function startsWithDelimiter(buffer: Buffer): boolean {
  const start = buffer.subarray(0, UTF8_BOM.length).equals(UTF8_BOM)
    ? UTF8_BOM.length
    : 0;
  if (!buffer.subarray(start, start + DELIMITER.length).equals(DELIMITER)) {
    return false;
  }
  const rest = buffer
    .subarray(start + DELIMITER.length, start + DELIMITER.length + 64)
    .toString("utf-8");
  return /^[ \t]*\r?\n/.test(rest);
}

/**
 * Walks a source tree and sorts every file into content items, static
 * files, layouts, includes and data
 */
export class ContentScanner {
  private readonly logger: Logger;

  constructor(options: ContentScannerOptions = {}) {
    this.logger = (options.logger ?? Logger.getInstance()).child(
      "ContentScanner",
    );
  }

  async scan(
    sourceDir: string,
    config: SiteConfig,
    options: ScanOptions = {},
  ): Promise<ScanResult> {
    const now = options.now ?? new Date();
    const root = resolve(sourceDir);
    const result: ScanResult = {
      items: [],
      staticFiles: [],
      layouts: new Map(),
      includes: new Map(),
      data: {},
      errors: [],
      skipped: [],
    };

    const destination = toPosix(relative(root, resolve(root, config.destination)));
    const isIgnored = (relativePath: string, name: string): boolean => {
      if (relativePath === destination) {
        return true;
      }
      if (matchesAnyGlob(relativePath, config.include)) {
        return false;
      }
      return (
        name.startsWith(".") ||
        name.startsWith("#") ||
        name.endsWith("~") ||
        matchesAnyGlob(relativePath, DEFAULT_EXCLUDES) ||
        matchesAnyGlob(relativePath, config.exclude)
      );
    };

    const report = (error: ContentParseError): void => {
      if (config.strict_front_matter) {
        throw error;
      }
      this.logger.warn(`Skipping ${error.sourcePath}: ${error.message}`);
      result.errors.push(error);
    };

    const entries = await readdir(root, { withFileTypes: true });
    for (const entry of [...entries].sort(byName)) {
      const relativePath = entry.name;
      if (isIgnored(relativePath, entry.name)) {
        continue;
      }

      if (!entry.name.startsWith("_")) {
        const files = entry.isDirectory()
          ? await this.walk(root, relativePath, isIgnored)
          : entry.isFile()
            ? [{ relativePath, absolutePath: join(root, relativePath) }]
            : [];
        for (const file of files) {
          await this.addSiteFile(file, config, now, result, report);
        }
        continue;
      }

      if (!entry.isDirectory()) {
        continue;
      }

      if (entry.name === "_layouts") {
        for (const file of await this.walk(root, relativePath, isIgnored)) {
          await this.addLayout(file, result, report);
        }
      } else if (entry.name === "_includes") {
        for (const file of await this.walk(root, relativePath, isIgnored)) {
          const name = file.relativePath.slice("_includes/".length);
          result.includes.set(name, await readFile(file.absolutePath, "utf-8"));
        }
      } else if (entry.name === "_data") {
        result.data = await loadDataFiles(join(root, relativePath), {
          onError: report,
        });
      } else {
        const source = this.collectionFor(entry.name, config);
        if (!source) {
          this.logger.debug(`Ignoring ${relativePath}/`);
          continue;
        }
        for (const file of await this.walk(root, relativePath, isIgnored)) {
          await this.addCollectionFile(file, source, config, now, result, report);
        }
      }
    }

    this.logger.debug(
      `Found ${result.items.length} items, ${result.staticFiles.length} static files, ` +
        `${result.layouts.size} layouts, ${result.includes.size} includes`,
    );
    return result;
  }

  private collectionFor(
    directory: string,
    config: SiteConfig,
  ): CollectionSource | undefined {
    if (directory === "_posts") {
      return { collection: "posts", draft: false };
    }
    if (directory === "_drafts") {
      return config.drafts ? { collection: "posts", draft: true } : undefined;
    }
    const name = directory.slice(1);
    return name in config.collections
      ? { collection: name, draft: false }
      : undefined;
  }

  /**
   * Files below a directory in sorted path order
   * Underscore-prefixed entries below the top level are ignored
   */
  private async walk(
    root: string,
    relativeDir: string,
    isIgnored: (relativePath: string, name: string) => boolean,
  ): Promise<SourceFile[]> {
    const entries = await readdir(join(root, relativeDir), {
      withFileTypes: true,
    });
    const files: SourceFile[] = [];

    for (const entry of [...entries].sort(byName)) {
      const relativePath = `${relativeDir}/${entry.name}`;
      if (entry.name.startsWith("_") || isIgnored(relativePath, entry.name)) {
        continue;
      }
      if (entry.isDirectory()) {
        files.push(...(await this.walk(root, relativePath, isIgnored)));
      } else if (entry.isFile()) {
        files.push({ relativePath, absolutePath: join(root, relativePath) });
      }
    }

    return files;
  }

  private async addLayout(
    file: SourceFile,
    result: ScanResult,
    report: (error: ContentParseError) => void,
  ): Promise<void> {
    const raw = await readFile(file.absolutePath, "utf-8");
    try {
      const parsed = parseFrontMatter(raw, file.relativePath);
      const name = file.relativePath
        .slice("_layouts/".length)
        .replace(/\.[^./]+$/, "");
      result.layouts.set(name, {
        name,
        relativePath: file.relativePath,
        frontMatter: parsed?.frontMatter ?? {},
        body: parsed ? parsed.body : raw,
      });
    } catch (error) {
      if (error instanceof ContentParseError) {
        report(error);
        return;
      }
      throw error;
    }
  }

  /**
   * A file outside underscore directories: an item when it has front
   * matter, a static file otherwise
   */
  private async addSiteFile(
    file: SourceFile,
    config: SiteConfig,
    now: Date,
    result: ScanResult,
    report: (error: ContentParseError) => void,
  ): Promise<void> {
    const buffer = await readFile(file.absolutePath);
    if (!startsWithDelimiter(buffer)) {
      result.staticFiles.push({
        relativePath: file.relativePath,
        sourcePath: file.absolutePath,
      });
      return;
    }

    try {
      const parsed = parseFrontMatter(buffer.toString("utf-8"), file.relativePath);
      if (!parsed) {
        result.staticFiles.push({
          relativePath: file.relativePath,
          sourcePath: file.absolutePath,
        });
        return;
      }
      const declared = getString(parsed.frontMatter, "collection");
      this.addItem(
        {
          relativePath: file.relativePath,
          frontMatter: parsed.frontMatter,
          body: parsed.body,
          collection: declared,
          draft: false,
        },
        config,
        now,
        result,
      );
    } catch (error) {
      if (error instanceof ContentParseError) {
        report(error);
        return;
      }
      throw error;
    }
  }

  private async addCollectionFile(
    file: SourceFile,
    source: CollectionSource,
    config: SiteConfig,
    now: Date,
    result: ScanResult,
    report: (error: ContentParseError) => void,
  ): Promise<void> {
    const raw = await readFile(file.absolutePath, "utf-8");
    try {
      const parsed = parseFrontMatter(raw, file.relativePath);
      if (!parsed && !isMarkdownExtension(extname(file.relativePath))) {
        this.logger.debug(`Ignoring ${file.relativePath}: no front matter`);
        return;
      }
      this.addItem(
        {
          relativePath: file.relativePath,
          frontMatter: parsed?.frontMatter ?? {},
          body: parsed ? parsed.body : raw,
          collection: source.collection,
          draft: source.draft,
        },
        config,
        now,
        result,
      );
    } catch (error) {
      if (error instanceof ContentParseError) {
        report(error);
        return;
      }
      throw error;
    }
  }

  /**
   * @throws ContentParseError when a post has no usable date
   */
  private addItem(
    input: {
      relativePath: string;
      frontMatter: FrontMatter;
      body: string;
      collection: string | undefined;
      draft: boolean;
    },
    config: SiteConfig,
    now: Date,
    result: ScanResult,
  ): void {
    const { relativePath, collection, draft } = input;
    const stem = fileStem(relativePath);
    const dated = DATED_FILE_NAME.exec(stem);
    const frontMatter = applyFrontMatterDefaults(input, config.defaults);

    if (frontMatter["published"] === false) {
      this.logger.debug(`Skipping unpublished ${relativePath}`);
      result.skipped.push(relativePath);
      return;
    }

    const fileDate = dated
      ? new Date(`${dated[1]}-${dated[2]}-${dated[3]}T00:00:00Z`)
      : undefined;
    const date =
      toDate(frontMatter["date"]) ??
      (fileDate && !Number.isNaN(fileDate.getTime()) ? fileDate : undefined) ??
      (draft ? now : undefined);

    if (collection === "posts" && !date) {
      throw new ContentParseError(
        parseError(
          relativePath,
          "date",
          "expected a date in front matter or a YYYY-MM-DD- file name prefix",
        ),
        relativePath,
      );
    }

    if (collection === "posts" && !config.future && date && date > now) {
      this.logger.debug(`Skipping future post ${relativePath}`);
      result.skipped.push(relativePath);
      return;
    }

    result.items.push({
      relativePath,
      kind: collection ? "document" : "page",
      frontMatter,
      body: input.body,
      extension: extname(relativePath).toLowerCase(),
      collection,
      date,
      slug: dated?.[4] ?? stem,
      draft,
    });
  }
}
