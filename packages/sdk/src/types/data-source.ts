/**
 * Contracts the core consumes from its surroundings.
 */

/** A result row with named fields. */
export type DataRow = Readonly<Record<string, unknown>>;

/** Query execution capability of a database connection. */
export interface DataSource {
  /** Run a query and return every row. */
  query(sql: string): Promise<readonly DataRow[]>;
  /** Run a query and return its first row, or undefined when there is none. */
  get(sql: string): Promise<DataRow | undefined>;
}

/** Handle of a pending scheduled callback. */
export interface ScheduledTask {
  cancel(): void;
}

/** Timer capability used to re-arm the next poll. */
export interface Scheduler {
  schedule(delaySeconds: number, callback: () => void): ScheduledTask;
}
