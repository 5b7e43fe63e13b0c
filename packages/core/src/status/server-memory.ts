/**
 * Server memory sampling.
 *
 * The status row's Value field looks like "2048.125 MB"; only the
 * leading number is kept and the unit is ignored. The figure comes from
 * whichever node the connection lands on, not the whole cluster.
 */

import type { DataRow, DataSource } from "@plantop/sdk";
import { MalformedStatusRowError, QueryError, describeError } from "@plantop/sdk";

export const MEMORY_STATUS_QUERY = "show status like 'Total_server_memory'";

const NUMERIC_TOKEN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/** Parse the leading numeric token of a status value. */
export function parseServerMemoryValue(value: unknown): number {
  if (typeof value !== "string") {
    throw new MalformedStatusRowError(value, `expected a string value, got ${value === null ? "null" : typeof value}`);
  }

  const token = value.split(" ")[0];
  if (!NUMERIC_TOKEN.test(token)) {
    throw new MalformedStatusRowError(value, `value "${value}" has no numeric prefix`);
  }

  const parsed = Number.parseFloat(token);
  if (!Number.isFinite(parsed)) {
    throw new MalformedStatusRowError(value, `value "${value}" is not finite`);
  }
  return parsed;
}

/**
 * Read total server memory usage.
 *
 * @throws QueryError when the lookup fails.
 * @throws MalformedStatusRowError when the row is missing or unparsable.
 */
export async function fetchServerMemoryUsage(source: DataSource): Promise<number> {
  let row: DataRow | undefined;
  try {
    row = await source.get(MEMORY_STATUS_QUERY);
  } catch (err) {
    if (err instanceof QueryError) throw err;
    throw new QueryError(MEMORY_STATUS_QUERY, describeError(err), { cause: err });
  }

  if (!row) {
    throw new MalformedStatusRowError(undefined, "Total_server_memory status row not found");
  }
  return parseServerMemoryValue(row.Value);
}
