/**
 * Record sources
 */

import type { RecordSource, Table } from "./types.js";

/**
 * Check whether a source is a table rather than a bare iterable
 */
export function isTable<R>(source: RecordSource<R>): source is Table<R> {
  return typeof source === "object" && "records" in source && typeof source.records === "function";
}

/**
 * Iterate the records of a table or iterable
 */
export function rowsOf<R>(source: RecordSource<R>): Iterable<R> {
  return isTable(source) ? source.records() : source;
}
