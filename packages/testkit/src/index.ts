/**
 * record-index testkit
 */

export { pairs, tableOf, keyByInt, keyByString, pairFields, buildPair } from "./fixtures.js";
export type { Pair, PairFields } from "./fixtures.js";
export {
  checkKeyDeterminism,
  checkFindAbsent,
  checkFindUnique,
  checkInvertedRange,
  checkKeyRoundTrip,
  checkIndexedContract,
} from "./conformance.js";
export type { QueryIndex, ContractCheckOptions } from "./conformance.js";
