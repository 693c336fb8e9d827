import type { CollectionDefinition, SiteConfig } from "@folio/config";
import { expandPermalinkStyle } from "@folio/config";
import { getString, type ContentItem } from "@folio/content";
import {
  ConfigError,
  Logger,
  duplicateError,
  sortByKey,
  toDate,
} from "@folio/utils";
import {
  COLLECTION_PERMALINK,
  PAGE_PERMALINK,
  resolvePermalink,
  toOutputPath,
} from "./permalink";
import type {
  AggregationResult,
  Collection,
  DroppedItem,
  ItemSummary,
  ResolvedItem,
} from "./types";

export type UnknownCollectionPolicy = "warn" | "error";

export interface CollectionAggregatorOptions {
  collections: Readonly<Record<string, CollectionDefinition>>;
  /** Pattern for posts unless `collections.posts.permalink` is set */
  postsPermalink?: string;
  unknownCollections?: UnknownCollectionPolicy;
  logger?: Logger;
}

function sortValue(value: unknown): string | number | undefined {
  if (typeof value === "number" || typeof value === "string") {
    return value;
  }
  return toDate(value)?.getTime();
}

function summarize(item: ResolvedItem): ItemSummary {
  return {
    relativePath: item.relativePath,
    url: item.url,
    title: getString(item.frontMatter, "title"),
    date: item.date,
  };
}

/**
 * Groups content items into the configured collections and resolves
 * every item's permalink and output path
 */
export class CollectionAggregator {
  private readonly logger: Logger;
  private readonly definitions: Map<string, CollectionDefinition>;
  private readonly policy: UnknownCollectionPolicy;

  constructor(private readonly options: CollectionAggregatorOptions) {
    this.logger = (options.logger ?? Logger.getInstance()).child(
      "CollectionAggregator",
    );
    this.policy = options.unknownCollections ?? "warn";

    // posts always exists and comes first
    const posts: CollectionDefinition = options.collections["posts"] ?? {
      output: true,
    };
    this.definitions = new Map([["posts", posts]]);
    for (const [name, definition] of Object.entries(options.collections)) {
      this.definitions.set(name, definition);
    }
  }

  static fromConfig(config: SiteConfig, logger?: Logger): CollectionAggregator {
    return new CollectionAggregator({
      collections: config.collections,
      postsPermalink: config.permalink,
      unknownCollections: config.unknown_collections,
      ...(logger ? { logger } : {}),
    });
  }

  /**
   * @throws ConfigError for an undeclared collection under the "error"
   * policy, or when two rendered items share an output path
   */
  aggregate(items: readonly ContentItem[]): AggregationResult {
    const grouped = new Map<string, ContentItem[]>(
      [...this.definitions.keys()].map((name) => [name, []]),
    );
    const pages: ResolvedItem[] = [];
    const dropped: DroppedItem[] = [];

    for (const item of items) {
      if (item.collection === undefined) {
        pages.push(this.resolve(item, PAGE_PERMALINK));
        continue;
      }

      const members = grouped.get(item.collection);
      if (members) {
        members.push(item);
        continue;
      }

      const reason = `collection "${item.collection}" is not declared`;
      if (this.policy === "error") {
        throw new ConfigError(
          `Unknown collection "${item.collection}" in ${item.relativePath}`,
          { collection: item.collection, sourcePath: item.relativePath },
        );
      }
      this.logger.warn(`Dropping ${item.relativePath}: ${reason}`);
      dropped.push({
        relativePath: item.relativePath,
        collection: item.collection,
        reason,
      });
    }

    const collections = new Map<string, Collection>();
    for (const [name, definition] of this.definitions) {
      const permalink = this.permalinkFor(name, definition);
      const resolved = (grouped.get(name) ?? []).map((item) =>
        this.resolve(item, permalink),
      );
      const descending = name === "posts" && definition.sort_by === undefined;
      const sorted = this.sort(name, definition, resolved);
      collections.set(name, {
        name,
        output: definition.output,
        permalink,
        items: this.link(sorted, descending),
      });
      this.logger.debug(`Collection ${name}: ${sorted.length} items`);
    }

    this.checkOutputPaths(collections, pages);
    return { collections, pages, dropped };
  }

  private permalinkFor(name: string, definition: CollectionDefinition): string {
    if (definition.permalink !== undefined) {
      return expandPermalinkStyle(definition.permalink);
    }
    if (name === "posts") {
      return this.options.postsPermalink ?? expandPermalinkStyle("date");
    }
    return COLLECTION_PERMALINK;
  }

  private resolve(item: ContentItem, pattern: string): ResolvedItem {
    const url = resolvePermalink(pattern, item);
    return { ...item, url, outputPath: toOutputPath(url) };
  }

  /**
   * `sort_by` when configured; posts by date, newest first; otherwise by
   * weight when any member has one. Items without the key keep their
   * discovery order after the others.
   */
  private sort(
    name: string,
    definition: CollectionDefinition,
    items: ResolvedItem[],
  ): ResolvedItem[] {
    const sortBy = definition.sort_by;
    if (sortBy !== undefined) {
      return sortByKey(items, (item) =>
        sortBy === "date" && item.date
          ? item.date.getTime()
          : sortValue(item.frontMatter[sortBy]),
      );
    }
    if (name === "posts") {
      return sortByKey(items, (item) => item.date?.getTime(), "desc");
    }
    const weight = (item: ResolvedItem): number | undefined => {
      const value = item.frontMatter["weight"];
      return typeof value === "number" ? value : undefined;
    };
    if (items.some((item) => weight(item) !== undefined)) {
      return sortByKey(items, weight);
    }
    return items;
  }

  /**
   * Assign neighbours; in a newest-first list `previous` is the older item
   */
  private link(items: ResolvedItem[], descending: boolean): ResolvedItem[] {
    return items.map((item, index) => {
      const before = items[index - 1];
      const after = items[index + 1];
      const previous = descending ? after : before;
      const next = descending ? before : after;
      return {
        ...item,
        previous: previous ? summarize(previous) : undefined,
        next: next ? summarize(next) : undefined,
      };
    });
  }

  private checkOutputPaths(
    collections: Map<string, Collection>,
    pages: ResolvedItem[],
  ): void {
    const seen = new Map<string, string>();
    const rendered = [
      ...[...collections.values()]
        .filter((collection) => collection.output)
        .flatMap((collection) => collection.items),
      ...pages,
    ];

    for (const item of rendered) {
      const existing = seen.get(item.outputPath);
      if (existing !== undefined) {
        throw new ConfigError(
          duplicateError(item.outputPath, "output path", existing, item.relativePath),
          { outputPath: item.outputPath },
        );
      }
      seen.set(item.outputPath, item.relativePath);
    }
  }
}
