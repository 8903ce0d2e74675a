import type { UsageType } from "./types.js";
import type { UsageRecord } from "./record.js";

export interface StoredUsage {
  usageType: UsageType;
  record: UsageRecord;
}

export interface UsageFilter {
  usageType?: UsageType;
  resource?: string;
  localProjectId?: string;
  username?: string;
  limit?: number;
}

export interface UsageStore {
  insert(entry: StoredUsage): void;
  getAll(filter?: UsageFilter): StoredUsage[];
  /** Remove every entry, or only those of `usageType`. Returns how many were removed. */
  clear(usageType?: UsageType): number;
}

/** Keeps entries in insertion order, which is the order they are submitted in. */
export class InMemoryUsageStore implements UsageStore {
  private entries: StoredUsage[] = [];

  insert(entry: StoredUsage): void {
    this.entries.push(entry);
  }

  getAll(filter?: UsageFilter): StoredUsage[] {
    let results = [...this.entries];

    if (filter?.usageType !== undefined) {
      const usageType = filter.usageType;
      results = results.filter((e) => e.usageType === usageType);
    }

    if (filter?.resource !== undefined) {
      const resource = filter.resource;
      results = results.filter((e) => e.record.resource === resource);
    }

    if (filter?.localProjectId !== undefined) {
      const localProjectId = filter.localProjectId;
      results = results.filter((e) => e.record.localProjectId === localProjectId);
    }

    if (filter?.username !== undefined) {
      const username = filter.username;
      results = results.filter((e) => e.record.username === username);
    }

    if (filter?.limit !== undefined && filter.limit > 0) {
      results = results.slice(0, filter.limit);
    }

    return results;
  }

  clear(usageType?: UsageType): number {
    const before = this.entries.length;
    this.entries = usageType
      ? this.entries.filter((e) => e.usageType !== usageType)
      : [];
    return before - this.entries.length;
  }
}
