/**
 * Snapshot Fetcher: reads the cumulative counters of every active plan.
 *
 * The query is stored verbatim so rows produced by the monitor's own
 * polling can be recognized and dropped. Plans without a plan hash are
 * leaf-only plans with no aggregator-level correspondent; they cannot be
 * joined across polls and are filtered out both in SQL and here.
 */

import { z } from "zod";
import type { DataRow, DataSource, PlanCounterRecord, PlanCounterSnapshot, PlanIdentity } from "@plantop/sdk";
import { QueryError, describeError } from "@plantop/sdk";
import { createLogger, formatZodError } from "@plantop/shared";

const logger = createLogger("PlanCacheFetcher");

export const PLANCACHE_QUERY =
  "select database_name, query_text, plan_hash, " +
  "IFNULL(commits, 0) as commits, " +
  "IFNULL(rowcount, 0) as rowcount, " +
  "IFNULL(execution_time, 0) as execution_time, " +
  "IFNULL(queued_time, 0) as queued_time, " +
  "IFNULL(cpu_time, 0) as cpu_time, " +
  "IFNULL(memory_use, 0) as memory_use " +
  "from distributed_plancache_summary " +
  "where plan_hash is not null";

// The driver hands back BIGINT/DECIMAL columns as strings or bigints.
const counter = z.preprocess(
  (value) => (value === null || value === undefined ? 0 : value),
  z.coerce.number().finite().nonnegative(),
);

export const PlanCacheRowSchema = z.object({
  database_name: z.preprocess((value) => value ?? "", z.string()),
  query_text: z.string(),
  plan_hash: z.union([z.string().min(1), z.number(), z.bigint()]).transform((hash) => String(hash)),
  commits: counter,
  rowcount: counter,
  execution_time: counter,
  queued_time: counter,
  cpu_time: counter,
  memory_use: counter,
});

export type PlanCacheRow = z.infer<typeof PlanCacheRowSchema>;

function toRecord(row: PlanCacheRow): PlanCounterRecord {
  return {
    databaseName: row.database_name,
    queryText: row.query_text,
    planHash: row.plan_hash,
    commits: row.commits,
    rowCount: row.rowcount,
    executionTimeMicros: row.execution_time,
    queuedTimeMicros: row.queued_time,
    cpuTimeMillis: row.cpu_time,
    memoryBytes: row.memory_use,
  };
}

/**
 * Build a snapshot from raw summary rows, dropping the monitor's own
 * query and rows without a plan hash.
 *
 * @throws QueryError (code MALFORMED_ROW) when a remaining row does not
 *   have the expected shape.
 */
export function buildPlanCacheSnapshot(rows: readonly DataRow[]): PlanCounterSnapshot {
  const snapshot = new Map<PlanIdentity, PlanCounterRecord>();

  for (const row of rows) {
    if (row.plan_hash === null || row.plan_hash === undefined) continue;
    if (row.query_text === PLANCACHE_QUERY) continue;

    const parsed = PlanCacheRowSchema.safeParse(row);
    if (!parsed.success) {
      throw new QueryError(PLANCACHE_QUERY, `unexpected plan cache row: ${formatZodError(parsed.error)}`, {
        code: "MALFORMED_ROW",
      });
    }
    snapshot.set(parsed.data.plan_hash, toRecord(parsed.data));
  }

  return snapshot;
}

/**
 * Fetch the current plan cache snapshot.
 *
 * @throws QueryError when the data source fails or returns an unusable row.
 */
export async function fetchPlanCacheSnapshot(source: DataSource): Promise<PlanCounterSnapshot> {
  let rows: readonly DataRow[];
  try {
    rows = await source.query(PLANCACHE_QUERY);
  } catch (err) {
    if (err instanceof QueryError) throw err;
    throw new QueryError(PLANCACHE_QUERY, describeError(err), { cause: err });
  }

  const snapshot = buildPlanCacheSnapshot(rows);
  logger.debug("Fetched plan cache snapshot", { rows: rows.length, plans: snapshot.size });
  return snapshot;
}
