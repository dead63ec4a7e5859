/**
 * record-index core
 *
 * Capability contracts for indices over in-memory record collections, with
 * reference indices that implement them
 */

// Re-export contracts
export type {
  RecordKey,
  RecordFields,
  RecordBuild,
  Keyed,
  Comparator,
  RangeEnd,
  Table,
  RecordSource,
  Indexed,
  IndexedOwned,
  IndexedDestructured,
  IndexOptions,
  IndexConfig,
} from "./types.js";

// Re-export capability helpers and key ordering
export {
  recordKey,
  recordFields,
  recordBuild,
  ownKey,
  keyOf,
  fieldsWithout,
} from "./capabilities.js";
export { compareKeys, keysEqual, sortByKey } from "./compare.js";
export {
  lowerBound,
  upperBound,
  isEmptyRange,
  inRange,
  rangeBounds,
  equalBounds,
} from "./range.js";
export { isTable, rowsOf } from "./table.js";

// Reference indices
export { ScanIndex } from "./indexes/scan-index.js";
export { SortedIndex } from "./indexes/sorted-index.js";
export { OwnedIndex } from "./indexes/owned-index.js";
export type { OwnedIndexOptions } from "./indexes/owned-index.js";
export { DestructuredIndex } from "./indexes/destructured-index.js";
export type {
  DestructuringCapabilities,
  DestructuredIndexOptions,
} from "./indexes/destructured-index.js";
export type { KeyCopyOptions } from "./indexes/base.js";

// Configuration and errors
export { resolveConfig } from "./config.js";
export { IndexError, IncomparableKeysError, CapabilityError, ConfigError } from "./errors.js";

// Observability
export { logger, formatEntry } from "./observability/logs.js";
export type { LogLevel, LogEntry } from "./observability/logs.js";
export { metrics } from "./observability/metrics.js";
export type { IndexMetrics } from "./observability/metrics.js";
