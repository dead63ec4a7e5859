/**
 * Conformance checks for index implementations
 *
 * Each check returns the violations it found as readable strings; an empty
 * array means the implementation conforms. They do not depend on a test
 * runner: assert `toEqual([])` in whichever one you use.
 */

import { inspect } from "node:util";
import { compareKeys } from "@record-index/core";
import type { Comparator, RecordBuild, RecordFields, RecordKey } from "@record-index/core";

/**
 * The query surface shared by every index family
 */
export interface QueryIndex<K, T = unknown> {
  find(key: K): readonly T[];
  findRange(start: K, end: K): readonly unknown[];
}

function show(value: unknown): string {
  return inspect(value, { depth: 4, breakLength: Infinity });
}

/**
 * Extracting a key twice from the same record yields equal keys
 */
export function checkKeyDeterminism<R, K>(
  records: Iterable<R>,
  capability: RecordKey<R, K>,
  compare: Comparator<K> = compareKeys
): string[] {
  const violations: string[] = [];
  let i = 0;
  for (const record of records) {
    const first = capability.key(record);
    const second = capability.key(record);
    if (compare(first, second) !== 0) {
      violations.push(`record #${i}: key changed between calls (${show(first)} then ${show(second)})`);
    }
    i++;
  }
  return violations;
}

/**
 * `find` on keys absent from the data returns nothing
 */
export function checkFindAbsent<K>(index: QueryIndex<K>, absentKeys: Iterable<K>): string[] {
  const violations: string[] = [];
  for (const key of absentKeys) {
    const found = index.find(key);
    if (found.length !== 0) {
      violations.push(`find(${show(key)}): expected no match, got ${found.length}`);
    }
  }
  return violations;
}

/**
 * `find` on a key present exactly once returns exactly one match with that key
 *
 * `keyOfResult` reads the key back from a result; omit it for indices whose
 * results do not carry the key (destructuring indices).
 */
export function checkFindUnique<K, T>(
  index: QueryIndex<K, T>,
  key: K,
  keyOfResult?: (result: T) => K,
  compare: Comparator<K> = compareKeys
): string[] {
  const found = index.find(key);
  if (found.length !== 1) {
    return [`find(${show(key)}): expected exactly one match, got ${found.length}`];
  }
  const [match] = found;
  if (keyOfResult && match !== undefined && compare(keyOfResult(match), key) !== 0) {
    return [`find(${show(key)}): match has key ${show(keyOfResult(match))}`];
  }
  return [];
}

/**
 * `findRange` with start > end returns nothing
 */
export function checkInvertedRange<K>(
  index: QueryIndex<K>,
  start: K,
  end: K,
  compare: Comparator<K> = compareKeys
): string[] {
  if (compare(start, end) <= 0) {
    return [`findRange(${show(start)}, ${show(end)}): start must be greater than end for this check`];
  }
  const found = index.findRange(start, end);
  if (found.length !== 0) {
    return [`findRange(${show(start)}, ${show(end)}): expected no match, got ${found.length}`];
  }
  return [];
}

/**
 * Rebuilding a record from its key and fields keeps the key
 */
export function checkKeyRoundTrip<R, K, F>(
  records: Iterable<R>,
  capabilities: RecordKey<R, K> & RecordFields<R, F> & RecordBuild<R, K, F>,
  compare: Comparator<K> = compareKeys
): string[] {
  const violations: string[] = [];
  let i = 0;
  for (const record of records) {
    const key = capabilities.key(record);
    const rebuilt = capabilities.build(key, capabilities.fields(record));
    const rebuiltKey = capabilities.key(rebuilt);
    if (compare(key, rebuiltKey) !== 0) {
      violations.push(`record #${i}: key ${show(key)} came back as ${show(rebuiltKey)}`);
    }
    i++;
  }
  return violations;
}

export interface ContractCheckOptions<K> {
  /** Keys known to be absent from the records */
  absent: K[];
  compare?: Comparator<K>;
}

/**
 * Run every applicable check against an index built from `records`
 *
 * Unique-key checks run for each key that occurs exactly once; the inverted
 * range check runs when the records hold at least two distinct keys.
 */
export function checkIndexedContract<R, K, T>(
  index: QueryIndex<K, T>,
  records: readonly R[],
  capability: RecordKey<R, K>,
  options: ContractCheckOptions<K>,
  keyOfResult?: (result: T) => K
): string[] {
  const compare = options.compare ?? compareKeys;
  const violations = [
    ...checkKeyDeterminism(records, capability, compare),
    ...checkFindAbsent(index, options.absent),
  ];

  const keys = records.map((record) => capability.key(record)).sort(compare);
  for (let i = 0; i < keys.length; i++) {
    const key = keys[i]!;
    const previous = keys[i - 1];
    const next = keys[i + 1];
    const repeatsPrevious = previous !== undefined && compare(previous, key) === 0;
    const repeatsNext = next !== undefined && compare(next, key) === 0;
    if (!repeatsPrevious && !repeatsNext) {
      violations.push(...checkFindUnique(index, key, keyOfResult, compare));
    }
  }

  const lowest = keys[0];
  const highest = keys[keys.length - 1];
  if (lowest !== undefined && highest !== undefined && compare(lowest, highest) < 0) {
    violations.push(...checkInvertedRange(index, highest, lowest, compare));
  }

  return violations;
}
