/**
 * Canonical ordering: binary UTF-16 code unit ascending only.
 * NEVER use localeCompare here; "Zeta" sorts before "alpha".
 */

/** Binary string comparison (UTF-16 code unit ascending). Returns -1 | 0 | 1. */
export function stringCompareBinary(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/** Sorted copy of names, binary order. */
export function sortNamesBinary(names: Iterable<string>): string[] {
  return [...names].sort(stringCompareBinary);
}

/** Stable sorted copy by key, binary order. Ties keep input order. */
export function sortByKeyBinary<T>(items: readonly T[], key: (item: T) => string): T[] {
  return items
    .map((item, index) => ({ item, index, k: key(item) }))
    .sort((a, b) => stringCompareBinary(a.k, b.k) || a.index - b.index)
    .map(({ item }) => item);
}
