/**
 * Shared plumbing for the reference indices: option resolution, build
 * logging and query metrics
 */

import { performance } from "node:perf_hooks";
import { compareKeys } from "../compare.js";
import { resolveConfig } from "../config.js";
import { logger } from "../observability/logs.js";
import { metrics } from "../observability/metrics.js";
import type { Comparator, IndexConfig, IndexOptions, RangeEnd } from "../types.js";

/**
 * A key together with the value stored for it
 */
export interface Entry<K, V> {
  key: K;
  value: V;
}

export function entryKey<K, V>(entry: Entry<K, V>): K {
  return entry.key;
}

/**
 * Options of indices that keep their own copy of each key
 */
export interface KeyCopyOptions<K> {
  /** Key copy function (default: structuredClone) */
  cloneKey?: (key: K) => K;
}

export function keyCloner<K>(options: KeyCopyOptions<K>): (key: K) => K {
  return options.cloneKey ?? ((key: K) => structuredClone(key));
}

let sequence = 0;

export abstract class BaseIndex<K> {
  readonly name: string;
  readonly rangeEnd: RangeEnd;
  protected readonly compare: Comparator<K>;
  readonly #metrics: boolean;

  protected constructor(kind: string, options: IndexOptions<K>) {
    let config: IndexConfig | undefined;
    const resolved = (): IndexConfig => (config ??= resolveConfig());

    this.name = options.name ?? `${kind}#${++sequence}`;
    this.compare = options.compare ?? compareKeys;
    this.rangeEnd = options.rangeEnd ?? resolved().rangeEnd;
    this.#metrics = options.metrics ?? resolved().metrics;
  }

  /** Number of records indexed */
  abstract get size(): number;

  /** Number of distinct keys */
  abstract get keyCount(): number;

  /**
   * Report a finished build; call at the end of the subclass constructor
   */
  protected built(startTime: number): void {
    const durationMs = performance.now() - startTime;

    if (this.#metrics) {
      metrics.recordBuild(this.name, durationMs, this.size, this.keyCount);
    }

    logger.debug("index.build", {
      index: this.name,
      details: {
        records: this.size,
        keys: this.keyCount,
        rangeEnd: this.rangeEnd,
        durationMs: durationMs.toFixed(2),
      },
    });
  }

  /**
   * Run a key lookup, recording hit/miss and timing
   */
  protected observeFind<T>(lookup: () => T[]): T[] {
    if (!this.#metrics) {
      return lookup();
    }

    const startTime = performance.now();
    const result = lookup();
    metrics.recordQueryTime(this.name, performance.now() - startTime);

    if (result.length > 0) {
      metrics.recordHit(this.name);
    } else {
      metrics.recordMiss(this.name);
    }
    return result;
  }

  /**
   * Run a range query, recording timing
   */
  protected observeRange<T>(lookup: () => T[]): T[] {
    if (!this.#metrics) {
      return lookup();
    }

    const startTime = performance.now();
    const result = lookup();
    metrics.recordQueryTime(this.name, performance.now() - startTime);
    metrics.recordRange(this.name);
    return result;
  }
}

/**
 * Sort entries by key, keeping input order among equal keys
 */
export function sortEntries<K, V>(entries: Entry<K, V>[], compare: Comparator<K>): Entry<K, V>[] {
  return entries.sort((a, b) => compare(a.key, b.key));
}

/**
 * Count distinct keys in a key-sorted entry array
 */
export function countDistinctKeys<K, V>(sorted: readonly Entry<K, V>[], compare: Comparator<K>): number {
  let count = 0;
  let previous: Entry<K, V> | undefined;
  for (const entry of sorted) {
    if (previous === undefined || compare(previous.key, entry.key) !== 0) {
      count++;
    }
    previous = entry;
  }
  return count;
}
