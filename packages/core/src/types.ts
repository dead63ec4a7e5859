/**
 * Core contracts for record indices
 *
 * Records, keys and fields are opaque to this layer. Records never implement
 * anything themselves: each capability is a separate object, so one record
 * type can be keyed several ways (one `RecordKey` per key type).
 */

/**
 * Extracts the key of a record
 *
 * Must be pure: repeated calls on an unmodified record return equal keys.
 * Sorting and range lookups depend on it.
 */
export interface RecordKey<R, K> {
  key(record: R): K;
}

/**
 * Extracts the non-key fields of a record, for destructuring indices
 */
export interface RecordFields<R, F> {
  fields(record: R): F;
}

/**
 * Rebuilds a record from its key and fields
 *
 * Only the key is required to survive the round trip:
 * `key(build(key(r), fields(r)))` equals `key(r)`.
 */
export interface RecordBuild<R, K, F> {
  build(key: K, fields: F): R;
}

/**
 * A record type that carries its own key
 */
export interface Keyed<K> {
  key(): K;
}

/**
 * Key ordering: negative if a < b, zero if equal, positive if a > b
 */
export type Comparator<K> = (a: K, b: K) => number;

/**
 * Whether the `end` bound of a range query is part of the range.
 * The start bound is always included.
 */
export type RangeEnd = "exclusive" | "inclusive";

/**
 * Opaque ownership container for records
 */
export interface Table<R> {
  records(): Iterable<R>;
}

/**
 * Anything an index can be built from
 */
export type RecordSource<R> = Table<R> | Iterable<R>;

/**
 * Index returning references into the records it was built from
 *
 * Results are the very objects of the source. No match is an empty array.
 */
export interface Indexed<R, K> {
  /** Policy applied to the `end` bound of `findRange` */
  readonly rangeEnd: RangeEnd;

  /** All records whose key equals `key` */
  find(key: K): readonly R[];

  /** All records whose key lies from `start` up to `end`; empty when start > end */
  findRange(start: K, end: K): readonly R[];
}

/**
 * Index returning copies, independent of any retained source
 */
export interface IndexedOwned<R, K> {
  readonly rangeEnd: RangeEnd;

  find(key: K): R[];

  findRange(start: K, end: K): R[];
}

/**
 * Index retaining key/fields pairs in place of the original records
 *
 * `find` returns the stored fields; `findRange` pairs each with its key.
 */
export interface IndexedDestructured<F, K> {
  readonly rangeEnd: RangeEnd;

  find(key: K): readonly F[];

  findRange(start: K, end: K): Array<readonly [K, F]>;
}

/**
 * Options shared by the reference indices
 */
export interface IndexOptions<K> {
  /** Name used in logs and metrics; metrics of indices sharing a name are merged (default: the index kind and a sequence number) */
  name?: string;
  /** Key ordering (default: compareKeys) */
  compare?: Comparator<K>;
  /** End bound policy for range queries (default: from configuration) */
  rangeEnd?: RangeEnd;
  /** Record query metrics (default: from configuration) */
  metrics?: boolean;
}

/**
 * Resolved process-wide configuration
 */
export interface IndexConfig {
  rangeEnd: RangeEnd;
  metrics: boolean;
}
