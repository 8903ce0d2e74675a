import { describe, it, expect, beforeEach } from "vitest";
import { UsageCollector } from "./collector.js";
import { InMemoryUsageStore } from "./store.js";
import { UsageRecord } from "./record.js";
import { InvalidFieldError, InvalidUsageTypeError } from "./errors.js";

function makeRecord(
  id: string,
  overrides: { resource?: string; localProjectId?: string; username?: string; charge?: string } = {},
): UsageRecord {
  return new UsageRecord({
    username: overrides.username ?? "jdoe",
    localProjectId: overrides.localProjectId ?? "proj-1",
    localRecordId: id,
    resource: overrides.resource ?? "cluster-a",
    submitTime: "2024-05-01T00:00:00Z",
    startTime: "2024-05-01T00:10:00Z",
    endTime: "2024-05-01T01:10:00Z",
    charge: overrides.charge ?? "1",
    nodeCount: "1",
  });
}

// ---------------------------------------------------------------------------
// InMemoryUsageStore
// ---------------------------------------------------------------------------
describe("InMemoryUsageStore", () => {
  let store: InMemoryUsageStore;

  beforeEach(() => {
    store = new InMemoryUsageStore();
  });

  it("starts empty", () => {
    expect(store.getAll()).toEqual([]);
  });

  it("keeps insertion order", () => {
    const a = makeRecord("a");
    const b = makeRecord("b");
    store.insert({ usageType: "Compute", record: b });
    store.insert({ usageType: "Compute", record: a });

    expect(store.getAll().map((e) => e.record)).toEqual([b, a]);
  });

  it("filters and limits", () => {
    store.insert({ usageType: "Compute", record: makeRecord("1", { resource: "r1" }) });
    store.insert({ usageType: "Storage", record: makeRecord("2", { resource: "r1" }) });
    store.insert({ usageType: "Compute", record: makeRecord("3", { resource: "r2" }) });
    store.insert({ usageType: "Compute", record: makeRecord("4", { resource: "r1", username: "bob" }) });

    const ids = (filter: Parameters<InMemoryUsageStore["getAll"]>[0]) =>
      store.getAll(filter).map((e) => e.record.localRecordId);

    expect(ids({ usageType: "Compute" })).toEqual(["1", "3", "4"]);
    expect(ids({ usageType: "Compute", resource: "r1" })).toEqual(["1", "4"]);
    expect(ids({ username: "bob" })).toEqual(["4"]);
    expect(ids({ limit: 2 })).toEqual(["1", "2"]);
    expect(ids({ limit: 0 })).toEqual(["1", "2", "3", "4"]);
  });

  it("matches an empty-string filter value instead of ignoring it", () => {
    store.insert({ usageType: "Compute", record: makeRecord("1", { resource: "" }) });
    store.insert({ usageType: "Compute", record: makeRecord("2", { resource: "r1" }) });

    expect(store.getAll({ resource: "" }).map((e) => e.record.localRecordId)).toEqual(["1"]);
    expect(store.getAll({ username: "" })).toEqual([]);
  });

  it("clears one usage type or everything", () => {
    store.insert({ usageType: "Compute", record: makeRecord("1") });
    store.insert({ usageType: "Storage", record: makeRecord("2") });
    store.insert({ usageType: "Compute", record: makeRecord("3") });

    expect(store.clear("Compute")).toBe(2);
    expect(store.getAll().map((e) => e.usageType)).toEqual(["Storage"]);
    expect(store.clear()).toBe(1);
    expect(store.getAll()).toEqual([]);
  });
});

// ---------------------------------------------------------------------------
// UsageCollector
// ---------------------------------------------------------------------------
describe("UsageCollector", () => {
  let collector: UsageCollector;

  beforeEach(() => {
    collector = new UsageCollector({ chunkSize: 2 });
  });

  it("normalizes the usage type when recording", () => {
    collector.record("compute", makeRecord("1"));
    collector.record("STORAGE", makeRecord("2"));

    expect(collector.query({ usageType: "Compute" }).map((r) => r.localRecordId)).toEqual(["1"]);
    expect(collector.query({ usageType: "Storage" }).map((r) => r.localRecordId)).toEqual(["2"]);
  });

  it("rejects unknown usage types", () => {
    expect(() => collector.record("Bogus", makeRecord("1"))).toThrow(InvalidUsageTypeError);
    expect(collector.query()).toEqual([]);
  });

  it("uses a provided store", () => {
    const store = new InMemoryUsageStore();
    const withStore = new UsageCollector({ store });
    withStore.record("Adjustment", makeRecord("1"));

    expect(store.getAll()).toHaveLength(1);
    expect(store.getAll()[0]?.usageType).toBe("Adjustment");
  });

  describe("summarize", () => {
    it("returns zeros when empty", () => {
      expect(collector.summarize()).toEqual({
        recordCount: 0,
        totalCharge: 0,
        byResource: {},
        byProject: {},
      });
    });

    it("totals charges per resource and project", () => {
      collector.record("Compute", makeRecord("1", { resource: "r1", localProjectId: "p1", charge: "10.5" }));
      collector.record("Compute", makeRecord("2", { resource: "r1", localProjectId: "p2", charge: "4" }));
      collector.record("Compute", makeRecord("3", { resource: "r2", localProjectId: "p1", charge: "0.25" }));

      expect(collector.summarize()).toEqual({
        recordCount: 3,
        totalCharge: 14.75,
        byResource: {
          r1: { charge: 14.5, count: 2 },
          r2: { charge: 0.25, count: 1 },
        },
        byProject: {
          p1: { charge: 10.75, count: 2 },
          p2: { charge: 4, count: 1 },
        },
      });
    });

    it("rounds away floating-point drift", () => {
      collector.record("Compute", makeRecord("1", { charge: "0.1" }));
      collector.record("Compute", makeRecord("2", { charge: "0.2" }));

      expect(collector.summarize().totalCharge).toBe(0.3);
    });

    it("sums charges received as JSON numbers", () => {
      const numeric = UsageRecord.fromDict({
        ...makeRecord("n1").toDict(),
        Charge: 2.5,
      });
      collector.record("Compute", numeric);
      collector.record("Compute", makeRecord("n2", { charge: "1.5" }));

      expect(collector.summarize().totalCharge).toBe(4);
    });

    it("honours the filter", () => {
      collector.record("Compute", makeRecord("1", { charge: "5" }));
      collector.record("Storage", makeRecord("2", { charge: "7" }));

      const summary = collector.summarize({ usageType: "Storage" });
      expect(summary.recordCount).toBe(1);
      expect(summary.totalCharge).toBe(7);
    });

    it("throws InvalidFieldError for a non-numeric charge", () => {
      collector.record("Compute", makeRecord("job-9", { charge: "lots" }));

      expect(() => collector.summarize()).toThrow(InvalidFieldError);
      expect(() => collector.summarize()).toThrow(
        "Invalid field Charge of record job-9: expected a number",
      );
    });
  });

  describe("messages", () => {
    it("chunks the records of one type in recorded order", () => {
      for (const id of ["1", "2", "3"]) collector.record("Compute", makeRecord(id));
      collector.record("Storage", makeRecord("s1"));

      const messages = [...collector.messages("compute")];

      expect(messages.map((m) => m.usageType)).toEqual(["Compute", "Compute"]);
      expect(messages.map((m) => m.records.map((r) => r.localRecordId))).toEqual([["1", "2"], ["3"]]);
      expect(collector.query()).toHaveLength(4);
    });

    it("accepts an explicit chunk size", () => {
      for (const id of ["1", "2", "3"]) collector.record("Compute", makeRecord(id));
      expect([...collector.messages("Compute", 10)]).toHaveLength(1);
    });

    it("yields nothing when no records of that type exist", () => {
      expect([...collector.messages("Adjustment")]).toEqual([]);
    });
  });

  describe("drain", () => {
    it("returns chunked messages and removes only that type", () => {
      for (const id of ["1", "2", "3"]) collector.record("Compute", makeRecord(id));
      collector.record("Storage", makeRecord("s1"));

      const drained = collector.drain("Compute");

      expect(drained.map((m) => m.records.length)).toEqual([2, 1]);
      expect(collector.query().map((r) => r.localRecordId)).toEqual(["s1"]);
      expect(collector.drain("Compute")).toEqual([]);
    });
  });
});
