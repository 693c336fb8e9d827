import type { ContentItem } from "@folio/content";

/**
 * Neighbour reference kept on an item; a summary rather than the item
 * itself so the graph stays acyclic
 */
export interface ItemSummary {
  relativePath: string;
  url: string;
  title?: string | undefined;
  date?: Date | undefined;
}

/**
 * A content item with its permalink resolved
 */
export interface ResolvedItem extends ContentItem {
  url: string;
  /** POSIX path relative to the destination, e.g. "projects/demo/index.html" */
  outputPath: string;
  previous?: ItemSummary | undefined;
  next?: ItemSummary | undefined;
}

export interface Collection {
  name: string;
  /** Whether the members are rendered to their own pages */
  output: boolean;
  permalink: string;
  items: ResolvedItem[];
}

export interface DroppedItem {
  relativePath: string;
  collection: string;
  reason: string;
}

export interface AggregationResult {
  /** Collections in declaration order, `posts` first */
  collections: Map<string, Collection>;
  /** Standalone pages in discovery order */
  pages: ResolvedItem[];
  dropped: DroppedItem[];
}
