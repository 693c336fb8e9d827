import type { ResolvedItem } from "@folio/collections";
import { getStringList } from "@folio/content";

/**
 * Map each term of the given front-matter keys to the items carrying it,
 * ordered by term; items keep their input order
 *
 * @example
 * ```typescript
 * const tags = groupByTerms(posts, ["tags"]);
 * const categories = groupByTerms(posts, ["category", "categories"]);
 * ```
 */
export function groupByTerms(
  items: readonly ResolvedItem[],
  keys: readonly string[],
): Map<string, ResolvedItem[]> {
  const groups = new Map<string, ResolvedItem[]>();

  for (const item of items) {
    const terms = new Set(
      keys.flatMap((key) => getStringList(item.frontMatter, key)),
    );
    for (const term of terms) {
      const members = groups.get(term);
      if (members) {
        members.push(item);
      } else {
        groups.set(term, [item]);
      }
    }
  }

  return new Map(
    [...groups].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)),
  );
}
