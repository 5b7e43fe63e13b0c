/**
 * Plain-text rendering of the latest interval metrics.
 *
 * Pure: takes the dashboard state and returns the lines to print.
 */

import type { IntervalMetricField, IntervalMetricRecord, PlanCacheDiff } from "@plantop/sdk";

export interface DashboardState {
  host: string;
  plans: PlanCacheDiff;
  cpuUtilization?: number;
  memoryUsage?: number;
  lastError?: string;
}

export interface RenderOptions {
  maxRows: number;
  sortBy: IntervalMetricField;
}

const COLUMNS: ReadonlyArray<{ title: string; value: (r: IntervalMetricRecord) => string }> = [
  { title: "Database", value: (r) => r.database },
  { title: "Executions/sec", value: (r) => r.executionsPerSec.toFixed(2) },
  { title: "RowCount/sec", value: (r) => r.rowsPerSec.toFixed(2) },
  { title: "CpuUtil", value: (r) => r.cpuUtilization.toFixed(2) },
  { title: "ExecutionTime/query", value: (r) => r.executionTimePerQuery.toFixed(2) },
  { title: "Memory/query", value: (r) => r.memoryPerQuery.toFixed(2) },
  { title: "QueuedTime/query", value: (r) => r.queuedTimePerQuery.toFixed(2) },
  { title: "Query", value: (r) => r.query },
];

function formatRow(cells: string[], widths: number[]): string {
  return cells
    .map((cell, i) => (i === cells.length - 1 ? cell : cell.padEnd(widths[i])))
    .join("  ");
}

/** One line per query; newlines inside query text would break the table. */
function flatten(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

export function renderDashboard(state: DashboardState, options: RenderOptions): string[] {
  const cpu = state.cpuUtilization === undefined ? "-" : state.cpuUtilization.toFixed(2);
  const memory = state.memoryUsage === undefined ? "-" : `${state.memoryUsage.toFixed(2)} MB`;
  const lines = [`plantop ${state.host}  cpu: ${cpu}  memory: ${memory}`];

  if (state.lastError) {
    lines.push(`last error: ${state.lastError}`);
  }
  lines.push("");

  const records = [...state.plans.values()].sort((a, b) => b[options.sortBy] - a[options.sortBy]);
  if (records.length === 0) {
    lines.push("No plans executed in the last interval.");
    return lines;
  }

  const shown = records.slice(0, options.maxRows);
  const cells = shown.map((r) => COLUMNS.map((c) => flatten(c.value(r))));
  const titles = COLUMNS.map((c) => c.title);
  const widths = titles.map((title, i) => Math.max(title.length, ...cells.map((row) => row[i].length)));

  lines.push(formatRow(titles, widths));
  for (const row of cells) {
    lines.push(formatRow(row, widths));
  }
  if (records.length > shown.length) {
    lines.push(`... ${records.length - shown.length} more plans`);
  }
  return lines;
}
