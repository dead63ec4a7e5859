/**
 * Linear-scan index
 *
 * Keeps the source records in input order and extracts keys on every query.
 * Results are references to the source records, in source order.
 */

import { performance } from "node:perf_hooks";
import { inRange, isEmptyRange } from "../range.js";
import { rowsOf } from "../table.js";
import type { Indexed, IndexOptions, RecordKey, RecordSource } from "../types.js";
import { BaseIndex, countDistinctKeys, sortEntries } from "./base.js";

export class ScanIndex<R, K> extends BaseIndex<K> implements Indexed<R, K> {
  readonly #records: R[];
  readonly #capability: RecordKey<R, K>;
  readonly #keyCount: number;

  constructor(source: RecordSource<R>, capability: RecordKey<R, K>, options: IndexOptions<K> = {}) {
    super("scan", options);
    const startTime = performance.now();

    this.#records = Array.from(rowsOf(source));
    this.#capability = capability;

    const keys = this.#records.map((record) => ({ key: capability.key(record), value: undefined }));
    this.#keyCount = countDistinctKeys(sortEntries(keys, this.compare), this.compare);

    this.built(startTime);
  }

  get size(): number {
    return this.#records.length;
  }

  get keyCount(): number {
    return this.#keyCount;
  }

  find(key: K): readonly R[] {
    return this.observeFind(() =>
      this.#records.filter((record) => this.compare(this.#capability.key(record), key) === 0)
    );
  }

  findRange(start: K, end: K): readonly R[] {
    return this.observeRange(() => {
      if (isEmptyRange(this.compare, start, end, this.rangeEnd)) {
        return [];
      }
      return this.#records.filter((record) =>
        inRange(this.compare, this.#capability.key(record), start, end, this.rangeEnd)
      );
    });
  }
}
