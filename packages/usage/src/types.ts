/** Usage types accepted by the accounting service. */
export const USAGE_TYPES = ["Compute", "Storage", "Adjustment"] as const;

export type UsageType = (typeof USAGE_TYPES)[number];

/**
 * A value as it appears on the wire. Record fields are strings in practice,
 * but are kept exactly as received, never coerced.
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

/**
 * Optional per-job attributes. Only `nodeCount` is always reported.
 */
export interface UsageAttributes {
  /** Number of nodes the job ran on */
  nodeCount: JsonValue;
  /** Number of cores used by the job */
  cpuCoreCount?: JsonValue;
  jobName?: JsonValue;
  memory?: JsonValue;
  /** Scheduler queue the job was submitted to */
  queue?: JsonValue;
}

/**
 * Flat constructor input for a UsageRecord.
 */
export interface UsageRecordInit {
  /** Local username of the user who ran the job; must match the AMIE username */
  username: JsonValue;
  /** Site project ID; must match the ProjectID the site registered with AMIE */
  localProjectId: JsonValue;
  /** Site job ID, typically a scheduler job id */
  localRecordId: JsonValue;
  /** Resource the job ran on; must match the AMIE resource name */
  resource: JsonValue;
  submitTime: JsonValue;
  startTime: JsonValue;
  endTime: JsonValue;
  /** Allocation units to deduct from the project allocation for this job */
  charge: JsonValue;
  nodeCount: JsonValue;
  cpuCoreCount?: JsonValue;
  jobName?: JsonValue;
  memory?: JsonValue;
  queue?: JsonValue;
  /** Job ID of the parent job when this record is a sub-job */
  parentRecordId?: JsonValue;
}

// --- Wire format ---

export interface UsageAttributesDict {
  NodeCount: JsonValue;
  CpuCoreCount?: JsonValue;
  JobName?: JsonValue;
  Memory?: JsonValue;
  Queue?: JsonValue;
}

export interface UsageRecordDict {
  Username: JsonValue;
  LocalProjectID: JsonValue;
  LocalRecordID: JsonValue;
  Resource: JsonValue;
  SubmitTime: JsonValue;
  StartTime: JsonValue;
  EndTime: JsonValue;
  Charge: JsonValue;
  Attributes: UsageAttributesDict;
  ParentRecordID?: JsonValue;
}

export interface UsageMessageDict {
  UsageType: UsageType;
  Records: UsageRecordDict[];
}
