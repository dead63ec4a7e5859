/**
 * Owned index
 *
 * Copies records on the way in and again on the way out, so neither later
 * changes to the source nor changes to a result reach the index.
 */

import { performance } from "node:perf_hooks";
import { equalBounds, rangeBounds } from "../range.js";
import { rowsOf } from "../table.js";
import type { IndexedOwned, IndexOptions, RecordKey, RecordSource } from "../types.js";
import {
  BaseIndex,
  countDistinctKeys,
  entryKey,
  keyCloner,
  sortEntries,
  type Entry,
  type KeyCopyOptions,
} from "./base.js";

export interface OwnedIndexOptions<R, K> extends IndexOptions<K>, KeyCopyOptions<K> {
  /** Copy function (default: structuredClone) */
  clone?: (record: R) => R;
}

export class OwnedIndex<R, K> extends BaseIndex<K> implements IndexedOwned<R, K> {
  readonly #entries: Entry<K, R>[];
  readonly #keyCount: number;
  readonly #clone: (record: R) => R;

  constructor(
    source: RecordSource<R>,
    capability: RecordKey<R, K>,
    options: OwnedIndexOptions<R, K> = {}
  ) {
    super("owned", options);
    const startTime = performance.now();

    const clone = options.clone ?? ((record: R) => structuredClone(record));
    this.#clone = clone;
    const cloneKey = keyCloner(options);

    // Keys come from the source record: a copy may have lost its prototype
    const entries = Array.from(rowsOf(source), (record) => ({
      key: cloneKey(capability.key(record)),
      value: clone(record),
    }));
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

  find(key: K): R[] {
    return this.observeFind(() => {
      const [from, to] = equalBounds(this.#entries, key, entryKey, this.compare);
      return this.#copy(from, to);
    });
  }

  findRange(start: K, end: K): R[] {
    return this.observeRange(() => {
      const [from, to] = rangeBounds(this.#entries, start, end, this.rangeEnd, entryKey, this.compare);
      return this.#copy(from, to);
    });
  }

  #copy(from: number, to: number): R[] {
    return this.#entries.slice(from, to).map((entry) => this.#clone(entry.value));
  }
}
