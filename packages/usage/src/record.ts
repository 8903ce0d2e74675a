import type {
  JsonValue,
  UsageAttributes,
  UsageAttributesDict,
  UsageRecordDict,
  UsageRecordInit,
} from "./types.js";
import {
  expectObject,
  joinPath,
  parseJson,
  readOptional,
  readRequired,
} from "./wire.js";

function isReported(value: JsonValue | undefined): value is JsonValue {
  return value !== undefined && value !== null;
}

/**
 * One accounting entry: the resources a single job consumed and the
 * allocation charge for it.
 */
export class UsageRecord {
  readonly username: JsonValue;
  readonly localProjectId: JsonValue;
  readonly localRecordId: JsonValue;
  readonly resource: JsonValue;
  readonly submitTime: JsonValue;
  readonly startTime: JsonValue;
  readonly endTime: JsonValue;
  readonly charge: JsonValue;
  readonly parentRecordId?: JsonValue;
  readonly attributes: Readonly<UsageAttributes>;

  constructor(init: UsageRecordInit) {
    this.username = init.username;
    this.localProjectId = init.localProjectId;
    this.localRecordId = init.localRecordId;
    this.resource = init.resource;
    this.submitTime = init.submitTime;
    this.startTime = init.startTime;
    this.endTime = init.endTime;
    this.charge = init.charge;
    if (isReported(init.parentRecordId)) this.parentRecordId = init.parentRecordId;

    const attributes: UsageAttributes = { nodeCount: init.nodeCount };
    if (isReported(init.cpuCoreCount)) attributes.cpuCoreCount = init.cpuCoreCount;
    if (isReported(init.jobName)) attributes.jobName = init.jobName;
    if (isReported(init.memory)) attributes.memory = init.memory;
    if (isReported(init.queue)) attributes.queue = init.queue;
    this.attributes = Object.freeze(attributes);
  }

  /**
   * Build a record from its wire object. Values are kept as received;
   * only presence is checked.
   *
   * @param path - prefix for field paths in errors, set when the record is
   *   nested inside a message (e.g. `Records[3]`)
   * @throws MissingFieldError when a required key is absent
   * @throws InvalidFieldError when the record or its `Attributes` is not an object
   */
  static fromDict(input: unknown, path = ""): UsageRecord {
    const obj = expectObject(input, path);
    const attributesPath = joinPath(path, "Attributes");
    const attrs = expectObject(readRequired(obj, "Attributes", path), attributesPath);

    return new UsageRecord({
      username: readRequired(obj, "Username", path),
      localProjectId: readRequired(obj, "LocalProjectID", path),
      localRecordId: readRequired(obj, "LocalRecordID", path),
      resource: readRequired(obj, "Resource", path),
      submitTime: readRequired(obj, "SubmitTime", path),
      startTime: readRequired(obj, "StartTime", path),
      endTime: readRequired(obj, "EndTime", path),
      charge: readRequired(obj, "Charge", path),
      nodeCount: readRequired(attrs, "NodeCount", attributesPath),
      cpuCoreCount: readOptional(attrs, "CpuCoreCount", attributesPath),
      jobName: readOptional(attrs, "JobName", attributesPath),
      memory: readOptional(attrs, "Memory", attributesPath),
      queue: readOptional(attrs, "Queue", attributesPath),
      parentRecordId: readOptional(obj, "ParentRecordID", path),
    });
  }

  /** @throws ParseError on malformed JSON */
  static fromJson(text: string): UsageRecord {
    return UsageRecord.fromDict(parseJson(text));
  }

  toDict(): UsageRecordDict {
    const { nodeCount, cpuCoreCount, jobName, memory, queue } = this.attributes;

    // Unreported attributes are left out entirely, never sent as null
    const attributes: UsageAttributesDict = { NodeCount: nodeCount };
    if (cpuCoreCount !== undefined) attributes.CpuCoreCount = cpuCoreCount;
    if (jobName !== undefined) attributes.JobName = jobName;
    if (memory !== undefined) attributes.Memory = memory;
    if (queue !== undefined) attributes.Queue = queue;

    const dict: UsageRecordDict = {
      Username: this.username,
      LocalProjectID: this.localProjectId,
      LocalRecordID: this.localRecordId,
      Resource: this.resource,
      SubmitTime: this.submitTime,
      StartTime: this.startTime,
      EndTime: this.endTime,
      Charge: this.charge,
      Attributes: attributes,
    };

    if (this.parentRecordId !== undefined) {
      dict.ParentRecordID = this.parentRecordId;
    }

    return dict;
  }

  toJson(): string {
    return JSON.stringify(this.toDict());
  }
}
