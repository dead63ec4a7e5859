/**
 * Record fixtures
 *
 * The pair table used throughout the tests: records keyed by `a`, either as
 * a number or as its decimal string.
 */

import { recordBuild, recordFields, recordKey } from "@record-index/core";
import type { RecordBuild, RecordFields, RecordKey, Table } from "@record-index/core";

export interface Pair {
  a: number;
  b: number;
}

export interface PairFields {
  b: number;
}

/**
 * Fresh copy of the pair table: {a:10,b:34}, {a:1,b:56}, {a:2,b:23}
 */
export function pairs(): Pair[] {
  return [
    { a: 10, b: 34 },
    { a: 1, b: 56 },
    { a: 2, b: 23 },
  ];
}

/**
 * Table wrapper over an array of records
 */
export function tableOf<R>(rows: R[]): Table<R> {
  return { records: () => rows };
}

export const keyByInt: RecordKey<Pair, number> = recordKey((pair: Pair) => pair.a);

export const keyByString: RecordKey<Pair, string> = recordKey((pair: Pair) => `${pair.a}`);

export const pairFields: RecordFields<Pair, PairFields> = recordFields((pair: Pair) => ({ b: pair.b }));

export const buildPair: RecordBuild<Pair, number, PairFields> = recordBuild(
  (a: number, fields: PairFields) => ({ a, b: fields.b })
);
