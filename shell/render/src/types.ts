import type { Collection, ResolvedItem } from "@folio/collections";
import type { SiteConfig } from "@folio/config";
import type { TemplateFile } from "@folio/content";

export interface NavigationItem {
  label: string;
  href: string;
  weight: number;
}

/**
 * Everything known about the site once collections are resolved
 */
export interface SiteModel {
  config: SiteConfig;
  data: Record<string, unknown>;
  /** Collections by name, `posts` included */
  collections: ReadonlyMap<string, Collection>;
  pages: readonly ResolvedItem[];
  /** Tag → posts, ordered by tag name */
  tags: ReadonlyMap<string, readonly ResolvedItem[]>;
  categories: ReadonlyMap<string, readonly ResolvedItem[]>;
  navigation: readonly NavigationItem[];
  /** Build time */
  time: Date;
  /** Excerpts after template substitution, by relative path */
  excerpts?: ReadonlyMap<string, string>;
}

export interface RenderContext {
  site: SiteModel;
  layouts: ReadonlyMap<string, TemplateFile>;
  includes: ReadonlyMap<string, string>;
}

export interface RenderedPage {
  relativePath: string;
  url: string;
  /** POSIX path relative to the destination */
  outputPath: string;
  /** Body after substitution and Markdown conversion, before layouts */
  content: string;
  html: string;
}
