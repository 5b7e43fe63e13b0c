/**
 * Plan cache data model.
 */

/** Opaque, stable key of a query execution plan (the plan hash as a string). */
export type PlanIdentity = string;

/** Raw cumulative counters of one plan cache entry, as read from the server. */
export interface PlanCounterRecord {
  databaseName: string;
  /** Parameterized query text. */
  queryText: string;
  planHash: PlanIdentity;
  /** Completed executions. */
  commits: number;
  rowCount: number;
  executionTimeMicros: number;
  queuedTimeMicros: number;
  cpuTimeMillis: number;
  memoryBytes: number;
}

/**
 * Counters of every active plan at one instant. Counters are cumulative
 * but may reset whenever the server replaces a plan's cache entry.
 */
export type PlanCounterSnapshot = ReadonlyMap<PlanIdentity, PlanCounterRecord>;

/** Rates of one plan over one polling interval. */
export interface IntervalMetricRecord {
  database: string;
  query: string;
  executionsPerSec: number;
  rowsPerSec: number;
  /** Fraction of one core-second spent per wall-clock second. */
  cpuUtilization: number;
  executionTimePerQuery: number;
  memoryPerQuery: number;
  queuedTimePerQuery: number;
}

export type PlanCacheDiff = ReadonlyMap<PlanIdentity, IntervalMetricRecord>;

/** Numeric columns of an IntervalMetricRecord, usable as a sort key. */
export type IntervalMetricField = Exclude<keyof IntervalMetricRecord, "database" | "query">;

export const INTERVAL_METRIC_FIELDS = [
  "executionsPerSec",
  "rowsPerSec",
  "cpuUtilization",
  "executionTimePerQuery",
  "memoryPerQuery",
  "queuedTimePerQuery",
] as const satisfies readonly IntervalMetricField[];
