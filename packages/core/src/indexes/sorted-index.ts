/**
 * Sorted-vector index
 *
 * Invariants:
 * - Entries are sorted by key once, at construction; equal keys keep source order
 * - Results are references to the source records, in ascending key order
 */

import { performance } from "node:perf_hooks";
import { equalBounds, rangeBounds } from "../range.js";
import { rowsOf } from "../table.js";
import type { Indexed, IndexOptions, RecordKey, RecordSource } from "../types.js";
import { BaseIndex, countDistinctKeys, entryKey, sortEntries, type Entry } from "./base.js";

export class SortedIndex<R, K> extends BaseIndex<K> implements Indexed<R, K> {
  readonly #entries: Entry<K, R>[];
  readonly #keyCount: number;

  constructor(source: RecordSource<R>, capability: RecordKey<R, K>, options: IndexOptions<K> = {}) {
    super("sorted", options);
    const startTime = performance.now();

    const entries = Array.from(rowsOf(source), (record) => ({ key: capability.key(record), value: record }));
    this.#entries = sortEntries(entries, this.compare);
    this.#keyCount = countDistinctKeys(this.#entries, this.compare);

    this.built(startTime);
  }

  get size(): number {
    return this.#entries.length;
  }

  get keyCount(): number {
    return this.#keyCount;
  }

  find(key: K): readonly R[] {
    return this.observeFind(() => {
      const [from, to] = equalBounds(this.#entries, key, entryKey, this.compare);
      return this.#slice(from, to);
    });
  }

  findRange(start: K, end: K): readonly R[] {
    return this.observeRange(() => {
      const [from, to] = rangeBounds(this.#entries, start, end, this.rangeEnd, entryKey, this.compare);
      return this.#slice(from, to);
    });
  }

  #slice(from: number, to: number): R[] {
    return this.#entries.slice(from, to).map((entry) => entry.value);
  }
}
