import type { ResolvedItem } from "@folio/collections";
import { getString, getStringList } from "@folio/content";
import type { SiteModel } from "../types";

export interface LayoutProps {
  site: SiteModel;
  page: ResolvedItem;
  /** Rendered inner content */
  content: string;
}

export function pageTitle(page: ResolvedItem): string | undefined {
  return getString(page.frontMatter, "title");
}

export function pageTags(page: ResolvedItem): string[] {
  return getStringList(page.frontMatter, "tags");
}
