/**
 * Key ordering
 */

import { IncomparableKeysError } from "./errors.js";
import type { Comparator, RecordKey } from "./types.js";

/**
 * Default key ordering
 *
 * Orders numbers, bigints, strings (code unit order), booleans (false < true),
 * dates (by time) and arrays (element by element, a shorter prefix first).
 * Keys of different kinds, NaN and invalid dates cannot be ordered.
 *
 * @throws IncomparableKeysError
 */
export function compareKeys<K>(a: K, b: K): number {
  return compareValues(a, b);
}

function compareValues(a: unknown, b: unknown): number {
  if (typeof a === "number" && typeof b === "number") {
    if (Number.isNaN(a) || Number.isNaN(b)) {
      throw new IncomparableKeysError(a, b);
    }
    return a < b ? -1 : a > b ? 1 : 0;
  }

  if (
    (typeof a === "string" && typeof b === "string") ||
    (typeof a === "bigint" && typeof b === "bigint")
  ) {
    return a < b ? -1 : a > b ? 1 : 0;
  }

  if (typeof a === "boolean" && typeof b === "boolean") {
    return a === b ? 0 : a ? 1 : -1;
  }

  if (a instanceof Date && b instanceof Date) {
    const ta = a.getTime();
    const tb = b.getTime();
    if (Number.isNaN(ta) || Number.isNaN(tb)) {
      throw new IncomparableKeysError(a, b);
    }
    return ta < tb ? -1 : ta > tb ? 1 : 0;
  }

  if (Array.isArray(a) && Array.isArray(b)) {
    const length = Math.min(a.length, b.length);
    for (let i = 0; i < length; i++) {
      const cmp = compareValues(a[i], b[i]);
      if (cmp !== 0) {
        return cmp;
      }
    }
    return a.length < b.length ? -1 : a.length > b.length ? 1 : 0;
  }

  throw new IncomparableKeysError(a, b);
}

/**
 * Key equality under a comparator
 */
export function keysEqual<K>(compare: Comparator<K>, a: K, b: K): boolean {
  return compare(a, b) === 0;
}

/**
 * Sort records by extracted key
 *
 * Returns a new array; records with equal keys keep their input order.
 * Each key is extracted once.
 */
export function sortByKey<R, K>(
  records: Iterable<R>,
  capability: RecordKey<R, K>,
  compare: Comparator<K> = compareKeys
): R[] {
  const decorated = Array.from(records, (record) => ({ key: capability.key(record), record }));
  decorated.sort((x, y) => compare(x.key, y.key));
  return decorated.map((entry) => entry.record);
}
