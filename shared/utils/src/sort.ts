/**
 * Sorting utilities for content items
 */

/**
 * Stable sort by a key extractor; entries whose key is undefined keep
 * their input order after the keyed ones
 */
export function sortByKey<T>(
  items: readonly T[],
  key: (item: T) => string | number | undefined,
  direction: "asc" | "desc" = "asc",
): T[] {
  const factor = direction === "asc" ? 1 : -1;
  return items
    .map((item, index) => ({ item, index, value: key(item) }))
    .sort((a, b) => {
      if (a.value === undefined && b.value === undefined) {
        return a.index - b.index;
      }
      if (a.value === undefined) {
        return 1;
      }
      if (b.value === undefined) {
        return -1;
      }
      if (a.value < b.value) {
        return -1 * factor;
      }
      if (a.value > b.value) {
        return 1 * factor;
      }
      return a.index - b.index;
    })
    .map((entry) => entry.item);
}
