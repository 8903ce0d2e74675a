import { resolveChunkSize } from "@amie-usage/core";
import { createLogger } from "@amie-usage/logger";
import type { JsonValue } from "./types.js";
import type { UsageRecord } from "./record.js";
import type { UsageFilter, UsageStore } from "./store.js";
import { InMemoryUsageStore } from "./store.js";
import { UsageMessage, normalizeUsageType } from "./message.js";
import { InvalidFieldError } from "./errors.js";

const log = createLogger("usage:collector");

export interface ChargeTotals {
  charge: number;
  count: number;
}

export interface UsageSummary {
  recordCount: number;
  totalCharge: number;
  byResource: Record<string, ChargeTotals>;
  byProject: Record<string, ChargeTotals>;
}

export interface UsageCollectorOptions {
  store?: UsageStore;
  /** Records per message. Default: resolveChunkSize() */
  chunkSize?: number;
}

function round6(value: number): number {
  return Math.round(value * 1_000_000) / 1_000_000;
}

function keyOf(value: JsonValue): string {
  return typeof value === "string" ? value : JSON.stringify(value);
}

function parseCharge(record: UsageRecord): number {
  const { charge } = record;
  let value = Number.NaN;
  if (typeof charge === "number") value = charge;
  else if (typeof charge === "string" && charge.trim() !== "") value = Number(charge);

  if (!Number.isFinite(value)) {
    throw new InvalidFieldError(`Charge of record ${keyOf(record.localRecordId)}`, "a number");
  }
  return value;
}

function addTo(bucket: Record<string, ChargeTotals>, key: string, charge: number): void {
  const entry = bucket[key] ?? { charge: 0, count: 0 };
  entry.charge += charge;
  entry.count += 1;
  bucket[key] = entry;
}

/**
 * Accumulates usage records until they are turned into messages for
 * submission.
 */
export class UsageCollector {
  private readonly store: UsageStore;
  private readonly chunkSize: number;

  constructor(options: UsageCollectorOptions = {}) {
    this.store = options.store ?? new InMemoryUsageStore();
    this.chunkSize = options.chunkSize ?? resolveChunkSize();
  }

  /** @throws InvalidUsageTypeError */
  record(usageType: string, record: UsageRecord): void {
    const normalized = normalizeUsageType(usageType);
    this.store.insert({ usageType: normalized, record });
    log.debug(
      `Recorded ${normalized} usage: ${keyOf(record.localRecordId)} on ${keyOf(record.resource)} (charge ${keyOf(record.charge)})`,
    );
  }

  query(filter?: UsageFilter): UsageRecord[] {
    return this.store.getAll(filter).map((e) => e.record);
  }

  /**
   * Total charge and record counts, overall and per resource and project.
   *
   * @throws InvalidFieldError if a stored charge is not numeric
   */
  summarize(filter?: UsageFilter): UsageSummary {
    const records = this.query(filter);

    const summary: UsageSummary = {
      recordCount: records.length,
      totalCharge: 0,
      byResource: {},
      byProject: {},
    };

    for (const record of records) {
      const charge = parseCharge(record);
      summary.totalCharge += charge;
      addTo(summary.byResource, keyOf(record.resource), charge);
      addTo(summary.byProject, keyOf(record.localProjectId), charge);
    }

    // Round to avoid floating-point drift
    summary.totalCharge = round6(summary.totalCharge);
    for (const bucket of [summary.byResource, summary.byProject]) {
      for (const entry of Object.values(bucket)) {
        entry.charge = round6(entry.charge);
      }
    }

    return summary;
  }

  /** Chunked messages for every stored record of `usageType`, in the order recorded. */
  messages(usageType: string, chunkSize: number = this.chunkSize): Generator<UsageMessage, void, undefined> {
    const normalized = normalizeUsageType(usageType);
    const records = this.query({ usageType: normalized });
    return new UsageMessage(normalized, records).chunked(chunkSize);
  }

  /**
   * Like `messages`, but collects every chunk up front and then removes the
   * records of `usageType` from the store.
   */
  drain(usageType: string, chunkSize: number = this.chunkSize): UsageMessage[] {
    const normalized = normalizeUsageType(usageType);
    const message = new UsageMessage(normalized, this.query({ usageType: normalized }));
    const chunks = [...message.chunked(chunkSize)];
    const removed = this.store.clear(normalized);
    log.debug(`Drained ${removed} ${normalized} records into ${chunks.length} messages`);
    return chunks;
  }
}
