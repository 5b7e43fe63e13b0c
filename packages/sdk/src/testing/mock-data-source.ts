/**
 * In-process stand-ins for the data source and scheduler contracts.
 *
 * MockDataSource answers queries from canned rows keyed by SQL text,
 * records every call, and can be told to fail or to hand control to a
 * custom handler (useful to hold a fetch open). ManualScheduler keeps
 * scheduled callbacks until a test fires them.
 */

import type { DataRow, DataSource, ScheduledTask, Scheduler } from "../index.js";

type MockResponse =
  | { kind: "rows"; rows: readonly DataRow[] }
  | { kind: "error"; error: Error }
  | { kind: "handler"; handler: () => Promise<readonly DataRow[]> };

export class MockDataSource implements DataSource {
  private responses: Map<string, MockResponse> = new Map();
  private calls: string[] = [];

  /** Answer `sql` with the given rows until changed. */
  setRows(sql: string, rows: readonly DataRow[]): this {
    this.responses.set(sql, { kind: "rows", rows });
    return this;
  }

  /** Make every call for `sql` reject with `error`. */
  failWith(sql: string, error: Error): this {
    this.responses.set(sql, { kind: "error", error });
    return this;
  }

  /** Delegate calls for `sql` to `handler`. */
  setHandler(sql: string, handler: () => Promise<readonly DataRow[]>): this {
    this.responses.set(sql, { kind: "handler", handler });
    return this;
  }

  async query(sql: string): Promise<readonly DataRow[]> {
    this.calls.push(sql);
    const response = this.responses.get(sql);
    if (!response) {
      throw new Error(`No response registered for query: ${sql}`);
    }
    switch (response.kind) {
      case "rows":
        return response.rows;
      case "error":
        throw response.error;
      case "handler":
        return response.handler();
    }
  }

  async get(sql: string): Promise<DataRow | undefined> {
    const rows = await this.query(sql);
    return rows[0];
  }

  /** SQL text of every call, in order. */
  getCalls(): string[] {
    return [...this.calls];
  }

  clearCalls(): void {
    this.calls = [];
  }
}

interface PendingTask {
  delaySeconds: number;
  callback: () => void;
  cancelled: boolean;
}

export class ManualScheduler implements Scheduler {
  private tasks: PendingTask[] = [];

  schedule(delaySeconds: number, callback: () => void): ScheduledTask {
    const task: PendingTask = { delaySeconds, callback, cancelled: false };
    this.tasks.push(task);
    return {
      cancel: () => {
        task.cancelled = true;
      },
    };
  }

  /** Number of scheduled callbacks that have neither fired nor been cancelled. */
  pendingCount(): number {
    return this.tasks.filter((t) => !t.cancelled).length;
  }

  /** Delays of pending callbacks, oldest first. */
  pendingDelays(): number[] {
    return this.tasks.filter((t) => !t.cancelled).map((t) => t.delaySeconds);
  }

  /** Fire the oldest pending callback. Returns false when none is pending. */
  runNext(): boolean {
    while (this.tasks.length > 0) {
      const task = this.tasks.shift();
      if (task && !task.cancelled) {
        task.callback();
        return true;
      }
    }
    return false;
  }
}

/** Build a plan cache summary row with zeroed counters. */
export function makePlanCacheRow(overrides: Partial<Record<string, unknown>> & { plan_hash: unknown }): DataRow {
  return {
    database_name: "db",
    query_text: "SELECT * FROM t WHERE id = @",
    commits: 0,
    rowcount: 0,
    execution_time: 0,
    queued_time: 0,
    cpu_time: 0,
    memory_use: 0,
    ...overrides,
  };
}
