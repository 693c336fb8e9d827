import { mergeConfig, type FrontMatterDefault } from "@folio/config";
import { matchesGlob } from "@folio/utils";
import type { ContentItem, FrontMatter } from "./types";

const GLOB_CHARS = /[*?[]/;

function normalizeScopePath(path: string): string {
  return path.replace(/^\.?\/+/, "").replace(/\/+$/, "");
}

function matchesScopePath(relativePath: string, scopePath: string): boolean {
  const normalized = normalizeScopePath(scopePath);
  if (normalized.length === 0) {
    return true;
  }
  if (GLOB_CHARS.test(normalized)) {
    return matchesGlob(relativePath, normalized);
  }
  return (
    relativePath === normalized || relativePath.startsWith(`${normalized}/`)
  );
}

/**
 * Scope type an item answers to: its collection name, or "pages"
 */
export function scopeTypeOf(item: Pick<ContentItem, "collection">): string {
  return item.collection ?? "pages";
}

/**
 * Whether a defaults entry applies to an item
 */
export function matchesDefaultScope(
  item: Pick<ContentItem, "relativePath" | "collection">,
  entry: FrontMatterDefault,
): boolean {
  if (entry.scope.type !== undefined && entry.scope.type !== scopeTypeOf(item)) {
    return false;
  }
  return matchesScopePath(item.relativePath, entry.scope.path);
}

function specificity(entry: FrontMatterDefault): number {
  return (
    normalizeScopePath(entry.scope.path).length * 2 +
    (entry.scope.type !== undefined ? 1 : 0)
  );
}

/**
 * Merge the configured front matter defaults beneath an item's own values
 *
 * Matching scopes are applied from least to most specific (longer path
 * first, then a typed scope over an untyped one); entries of equal
 * specificity apply in configuration order.
 */
export function applyFrontMatterDefaults(
  item: Pick<ContentItem, "relativePath" | "collection" | "frontMatter">,
  defaults: readonly FrontMatterDefault[],
): FrontMatter {
  const matching = defaults
    .map((entry, index) => ({ entry, index }))
    .filter(({ entry }) => matchesDefaultScope(item, entry))
    .sort(
      (a, b) =>
        specificity(a.entry) - specificity(b.entry) || a.index - b.index,
    );

  if (matching.length === 0) {
    return item.frontMatter;
  }

  const base = matching.reduce<Record<string, unknown>>(
    (acc, { entry }) => mergeConfig(acc, entry.values),
    {},
  );
  return mergeConfig(base, item.frontMatter);
}
