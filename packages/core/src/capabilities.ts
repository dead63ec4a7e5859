/**
 * Constructors for record capabilities
 */

import type { Keyed, RecordBuild, RecordFields, RecordKey } from "./types.js";

/**
 * Wrap a key extraction function
 * @example const keyByInt = recordKey((p: Pair) => p.a);
 */
export function recordKey<R, K>(key: (record: R) => K): RecordKey<R, K> {
  return { key };
}

/**
 * Wrap a fields extraction function
 */
export function recordFields<R, F>(fields: (record: R) => F): RecordFields<R, F> {
  return { fields };
}

/**
 * Wrap a record reconstruction function
 */
export function recordBuild<R, K, F>(build: (key: K, fields: F) => R): RecordBuild<R, K, F> {
  return { build };
}

/**
 * Key capability for records that carry their own `key()` method
 */
export function ownKey<R extends Keyed<K>, K>(): RecordKey<R, K> {
  return { key: (record) => record.key() };
}

/**
 * Key capability reading one property of the record
 */
export function keyOf<R, P extends keyof R>(property: P): RecordKey<R, R[P]> {
  return { key: (record) => record[property] };
}

/**
 * Fields capability keeping every property except `property`
 */
export function fieldsWithout<R extends object, P extends keyof R>(
  property: P
): RecordFields<R, Omit<R, P>> {
  return {
    fields: (record) => {
      const { [property]: _key, ...rest } = record;
      return rest;
    },
  };
}
