/**
 * @amie-usage/usage
 *
 * Usage records and usage messages for AMIE allocation charging: mapping
 * to and from the JSON wire format, and chunking large batches so each
 * posted message stays under the service's payload limit.
 *
 * @packageDocumentation
 */

export { UsageRecord } from "./record.js";
export { UsageMessage, normalizeUsageType, isUsageType } from "./message.js";
export { UsageCollector } from "./collector.js";
export type { UsageSummary, ChargeTotals, UsageCollectorOptions } from "./collector.js";
export { InMemoryUsageStore } from "./store.js";
export type { UsageStore, StoredUsage, UsageFilter } from "./store.js";
export { chunkByCount, chunkBySize } from "./chunk.js";
export type { SizeChunkOptions } from "./chunk.js";
export {
  UsageError,
  MissingFieldError,
  InvalidFieldError,
  ParseError,
  InvalidUsageTypeError,
  PayloadTooLargeError,
} from "./errors.js";
export type { UsageErrorCode } from "./errors.js";
export { USAGE_TYPES } from "./types.js";
export type {
  JsonValue,
  UsageType,
  UsageAttributes,
  UsageRecordInit,
  UsageAttributesDict,
  UsageRecordDict,
  UsageMessageDict,
} from "./types.js";
