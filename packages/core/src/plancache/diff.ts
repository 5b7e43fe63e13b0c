/**
 * Diff/Normalize Engine: turns two consecutive snapshots into per-plan
 * interval rates.
 *
 * Inclusion rules:
 *   - a plan absent from the old snapshot is included only when it has
 *     commits; its raw counters are the deltas (prior value taken as 0)
 *   - a known plan is included only when its commit delta is positive,
 *     which drops both idle plans and plans whose counters were reset
 *   - plans only in the old snapshot were evicted and are dropped
 *
 * Every per-query division is therefore by a positive commit delta.
 * Non-commit deltas are not floored at zero: a partial reset can yield a
 * negative per-query average even when commits advanced.
 */

import type {
  IntervalMetricRecord,
  PlanCacheDiff,
  PlanCounterRecord,
  PlanCounterSnapshot,
  PlanIdentity,
} from "@plantop/sdk";

/** Counter deltas of one plan over one interval. */
export interface PlanCounterDelta {
  commits: number;
  rowCount: number;
  executionTimeMicros: number;
  queuedTimeMicros: number;
  cpuTimeMillis: number;
  memoryBytes: number;
}

function counterDelta(current: PlanCounterRecord, previous?: PlanCounterRecord): PlanCounterDelta {
  if (!previous) {
    return {
      commits: current.commits,
      rowCount: current.rowCount,
      executionTimeMicros: current.executionTimeMicros,
      queuedTimeMicros: current.queuedTimeMicros,
      cpuTimeMillis: current.cpuTimeMillis,
      memoryBytes: current.memoryBytes,
    };
  }
  return {
    commits: current.commits - previous.commits,
    rowCount: current.rowCount - previous.rowCount,
    executionTimeMicros: current.executionTimeMicros - previous.executionTimeMicros,
    queuedTimeMicros: current.queuedTimeMicros - previous.queuedTimeMicros,
    cpuTimeMillis: current.cpuTimeMillis - previous.cpuTimeMillis,
    memoryBytes: current.memoryBytes - previous.memoryBytes,
  };
}

/**
 * Normalize one plan's deltas into rates. Callers guarantee
 * `delta.commits > 0` and `intervalSeconds > 0`.
 */
export function normalizeDiffEntry(
  intervalSeconds: number,
  databaseName: string,
  queryText: string,
  delta: PlanCounterDelta,
): IntervalMetricRecord {
  return {
    database: databaseName,
    query: queryText,
    executionsPerSec: delta.commits / intervalSeconds,
    rowsPerSec: delta.rowCount / intervalSeconds,
    cpuUtilization: delta.cpuTimeMillis / 1000 / intervalSeconds,
    executionTimePerQuery: delta.executionTimeMicros / delta.commits,
    memoryPerQuery: delta.memoryBytes / delta.commits,
    queuedTimePerQuery: delta.queuedTimeMicros / delta.commits,
  };
}

/**
 * Compute the interval metrics of every plan that completed executions
 * since `oldSnapshot`. Result order follows `newSnapshot`.
 */
export function diffPlanCache(
  newSnapshot: PlanCounterSnapshot,
  oldSnapshot: PlanCounterSnapshot,
  intervalSeconds: number,
): PlanCacheDiff {
  const diff = new Map<PlanIdentity, IntervalMetricRecord>();

  for (const [key, current] of newSnapshot) {
    const delta = counterDelta(current, oldSnapshot.get(key));
    if (delta.commits <= 0) continue;

    diff.set(key, normalizeDiffEntry(intervalSeconds, current.databaseName, current.queryText, delta));
  }

  return diff;
}

/** Total CPU utilization of the plans in one diff, in core-seconds per second. */
export function sumCpuUtilization(diff: PlanCacheDiff): number {
  let total = 0;
  for (const record of diff.values()) {
    total += record.cpuUtilization;
  }
  return total;
}
