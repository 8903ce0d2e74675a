import { Buffer } from "node:buffer";
import { DEFAULT_CHUNK_SIZE, DEFAULT_MAX_PAYLOAD_BYTES } from "@amie-usage/core";
import { createLogger } from "@amie-usage/logger";
import { USAGE_TYPES, type UsageMessageDict, type UsageType } from "./types.js";
import { InvalidFieldError, InvalidUsageTypeError } from "./errors.js";
import { UsageRecord } from "./record.js";
import { chunkByCount, chunkBySize } from "./chunk.js";
import { expectObject, parseJson, readRequired } from "./wire.js";

const log = createLogger("usage:message");

export function isUsageType(value: string): value is UsageType {
  return USAGE_TYPES.some((type) => type === value);
}

/**
 * Normalize capitalization ("compute", "COMPUTE" -> "Compute") and check
 * the result against the accepted usage types.
 */
export function normalizeUsageType(value: string): UsageType {
  const lower = value.toLowerCase();
  const normalized = lower.charAt(0).toUpperCase() + lower.slice(1);
  if (!isUsageType(normalized)) {
    throw new InvalidUsageTypeError(value);
  }
  return normalized;
}

/**
 * A batch of usage records of one type, as posted to the accounting service.
 */
export class UsageMessage {
  readonly usageType: UsageType;
  readonly records: readonly UsageRecord[];

  /** @throws InvalidUsageTypeError */
  constructor(usageType: string, records: readonly UsageRecord[]) {
    this.usageType = normalizeUsageType(usageType);
    this.records = Object.freeze([...records]);
  }

  static fromDict(input: unknown): UsageMessage {
    const obj = expectObject(input, "");
    const usageType = readRequired(obj, "UsageType", "");
    if (typeof usageType !== "string") {
      throw new InvalidUsageTypeError(JSON.stringify(usageType));
    }
    const rawRecords = readRequired(obj, "Records", "");
    if (!Array.isArray(rawRecords)) {
      throw new InvalidFieldError("Records", "an array");
    }

    const records = rawRecords.map((entry: unknown, i) =>
      UsageRecord.fromDict(entry, `Records[${i}]`),
    );
    return new UsageMessage(usageType, records);
  }

  static fromJson(text: string): UsageMessage {
    return UsageMessage.fromDict(parseJson(text));
  }

  toDict(): UsageMessageDict {
    return {
      UsageType: this.usageType,
      Records: this.records.map((record) => record.toDict()),
    };
  }

  toJson(): string {
    return JSON.stringify(this.toDict());
  }

  /**
   * Yield messages of the same type holding at most `chunkSize` records each,
   * in order. Records are shared with this message, not copied.
   *
   * @throws RangeError if `chunkSize` is not a positive integer
   */
  chunked(chunkSize: number = DEFAULT_CHUNK_SIZE): Generator<UsageMessage, void, undefined> {
    return this.wrap(chunkByCount(this.records, chunkSize));
  }

  /**
   * Yield messages whose serialized JSON is at most `maxBytes` bytes (UTF-8).
   *
   * Chunks are computed as the generator advances, so a PayloadTooLargeError
   * for an oversized record surfaces only when that record is reached.
   */
  chunkedBySize(maxBytes: number = DEFAULT_MAX_PAYLOAD_BYTES): Generator<UsageMessage, void, undefined> {
    const envelope = JSON.stringify({ UsageType: this.usageType, Records: [] });
    return this.wrap(
      chunkBySize(this.records, {
        measure: (record) => Buffer.byteLength(record.toJson(), "utf8"),
        maxSize: maxBytes,
        overhead: Buffer.byteLength(envelope, "utf8"),
        separator: 1,
      }),
    );
  }

  private *wrap(slices: Iterable<UsageRecord[]>): Generator<UsageMessage, void, undefined> {
    let count = 0;
    for (const slice of slices) {
      count += 1;
      yield new UsageMessage(this.usageType, slice);
    }
    log.debug(`Chunked ${this.records.length} ${this.usageType} records into ${count} messages`);
  }
}
