/**
 * Destructuring index
 *
 * Splits each record into its key and fields and keeps only those, so the
 * source collection can be released once the index is built. With a build
 * capability the full records can be materialised again on demand.
 *
 * Invariants:
 * - Entries are sorted by key; equal keys keep source order
 * - `find` returns the stored fields objects themselves
 */

import { performance } from "node:perf_hooks";
import { CapabilityError } from "../errors.js";
import { equalBounds, rangeBounds } from "../range.js";
import { rowsOf } from "../table.js";
import type {
  IndexedDestructured,
  IndexOptions,
  RecordBuild,
  RecordFields,
  RecordKey,
  RecordSource,
} from "../types.js";
import {
  BaseIndex,
  countDistinctKeys,
  entryKey,
  keyCloner,
  sortEntries,
  type Entry,
  type KeyCopyOptions,
} from "./base.js";

/**
 * Capabilities a destructuring index is built with; `build` is only needed
 * to materialise records
 */
export type DestructuringCapabilities<R, K, F> = RecordKey<R, K> &
  RecordFields<R, F> &
  Partial<RecordBuild<R, K, F>>;

export interface DestructuredIndexOptions<K> extends IndexOptions<K>, KeyCopyOptions<K> {}

export class DestructuredIndex<R, K, F> extends BaseIndex<K> implements IndexedDestructured<F, K> {
  readonly #entries: Entry<K, F>[];
  readonly #keyCount: number;
  readonly #capabilities: DestructuringCapabilities<R, K, F>;
  readonly #cloneKey: (key: K) => K;

  constructor(
    source: RecordSource<R>,
    capabilities: DestructuringCapabilities<R, K, F>,
    options: DestructuredIndexOptions<K> = {}
  ) {
    super("destructured", options);
    const startTime = performance.now();

    this.#capabilities = capabilities;
    const cloneKey = keyCloner(options);
    this.#cloneKey = cloneKey;

    // Stored keys are copies; returned keys are copies again, so the sort order holds
    const entries = Array.from(rowsOf(source), (record) => ({
      key: cloneKey(capabilities.key(record)),
      value: capabilities.fields(record),
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

  find(key: K): readonly F[] {
    return this.observeFind(() => {
      const [from, to] = equalBounds(this.#entries, key, entryKey, this.compare);
      return this.#entries.slice(from, to).map((entry) => entry.value);
    });
  }

  findRange(start: K, end: K): Array<readonly [K, F]> {
    return this.observeRange(() => {
      const [from, to] = rangeBounds(this.#entries, start, end, this.rangeEnd, entryKey, this.compare);
      return this.#pairs(from, to);
    });
  }

  /**
   * Every stored key/fields pair, in key order
   */
  entries(): Array<readonly [K, F]> {
    return this.#pairs(0, this.#entries.length);
  }

  /**
   * Rebuild every record, in key order
   * @throws CapabilityError if the index was built without `build`
   */
  records(): R[] {
    return this.#materialise(this.#entries);
  }

  /**
   * Rebuild the records matching `key`
   * @throws CapabilityError if the index was built without `build`
   */
  findRecords(key: K): R[] {
    const [from, to] = equalBounds(this.#entries, key, entryKey, this.compare);
    return this.#materialise(this.#entries.slice(from, to));
  }

  #pairs(from: number, to: number): Array<readonly [K, F]> {
    return this.#entries
      .slice(from, to)
      .map((entry) => [this.#cloneKey(entry.key), entry.value] as const);
  }

  #materialise(entries: readonly Entry<K, F>[]): R[] {
    const capabilities = this.#capabilities;
    if (capabilities.build === undefined) {
      throw new CapabilityError(this.name, "a record build capability");
    }

    const records: R[] = [];
    for (const entry of entries) {
      records.push(capabilities.build(this.#cloneKey(entry.key), entry.value));
    }
    return records;
  }
}
