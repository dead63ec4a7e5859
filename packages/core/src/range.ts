/**
 * Range helpers over key-sorted arrays
 *
 * Invariants:
 * - `start` is always included
 * - `end` is included only under the "inclusive" policy
 * - start > end is an empty range under either policy
 */

import type { Comparator, RangeEnd } from "./types.js";

/**
 * Index of the first entry whose key is >= `key`
 */
export function lowerBound<E, K>(
  entries: readonly E[],
  key: K,
  keyOf: (entry: E) => K,
  compare: Comparator<K>
): number {
  let lo = 0;
  let hi = entries.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if (compare(keyOf(entries[mid]!), key) < 0) {
      lo = mid + 1;
    } else {
      hi = mid;
    }
  }
  return lo;
}

/**
 * Index of the first entry whose key is > `key`
 */
export function upperBound<E, K>(
  entries: readonly E[],
  key: K,
  keyOf: (entry: E) => K,
  compare: Comparator<K>
): number {
  let lo = 0;
  let hi = entries.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if (compare(keyOf(entries[mid]!), key) <= 0) {
      lo = mid + 1;
    } else {
      hi = mid;
    }
  }
  return lo;
}

/**
 * True when no key can fall between `start` and `end`
 */
export function isEmptyRange<K>(
  compare: Comparator<K>,
  start: K,
  end: K,
  rangeEnd: RangeEnd
): boolean {
  const cmp = compare(start, end);
  return cmp > 0 || (cmp === 0 && rangeEnd === "exclusive");
}

/**
 * Whether `key` lies in the range
 */
export function inRange<K>(
  compare: Comparator<K>,
  key: K,
  start: K,
  end: K,
  rangeEnd: RangeEnd
): boolean {
  if (compare(key, start) < 0) {
    return false;
  }
  const cmp = compare(key, end);
  return rangeEnd === "inclusive" ? cmp <= 0 : cmp < 0;
}

/**
 * Slice bounds `[from, to)` of the entries matching the range
 */
export function rangeBounds<E, K>(
  entries: readonly E[],
  start: K,
  end: K,
  rangeEnd: RangeEnd,
  keyOf: (entry: E) => K,
  compare: Comparator<K>
): [number, number] {
  if (isEmptyRange(compare, start, end, rangeEnd)) {
    return [0, 0];
  }
  const from = lowerBound(entries, start, keyOf, compare);
  const to =
    rangeEnd === "inclusive"
      ? upperBound(entries, end, keyOf, compare)
      : lowerBound(entries, end, keyOf, compare);
  return [from, Math.max(from, to)];
}

/**
 * Slice bounds `[from, to)` of the entries whose key equals `key`
 */
export function equalBounds<E, K>(
  entries: readonly E[],
  key: K,
  keyOf: (entry: E) => K,
  compare: Comparator<K>
): [number, number] {
  return [lowerBound(entries, key, keyOf, compare), upperBound(entries, key, keyOf, compare)];
}
