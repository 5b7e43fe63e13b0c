/**
 * Error hierarchy for the plan cache monitor.
 */

export class PlantopError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "PlantopError";
  }
}

/**
 * Raised when the data source is unreachable, rejects a query, times out
 * or returns a row the fetcher cannot use.
 */
export class QueryError extends PlantopError {
  constructor(
    public readonly sql: string,
    message: string,
    options?: { cause?: unknown; code?: string },
  ) {
    super(`Query failed: ${message}`, options?.code ?? "QUERY_ERROR", options);
    this.name = "QueryError";
  }
}

/**
 * Raised when the server memory status row has no parsable value.
 */
export class MalformedStatusRowError extends PlantopError {
  constructor(
    public readonly value: unknown,
    message: string,
  ) {
    super(`Malformed status row: ${message}`, "MALFORMED_STATUS_ROW");
    this.name = "MalformedStatusRowError";
  }
}

export class DegenerateIntervalError extends PlantopError {
  constructor(public readonly intervalSeconds: number) {
    super(
      `Update interval must be a positive number of seconds, got ${intervalSeconds}`,
      "DEGENERATE_INTERVAL",
    );
    this.name = "DegenerateIntervalError";
  }
}

export class ConfigError extends PlantopError {
  constructor(
    message: string,
    options?: { cause?: unknown; code?: string },
  ) {
    super(message, options?.code ?? "CONFIG_ERROR", options);
    this.name = "ConfigError";
  }
}

/** Normalize any thrown value into a message string for logs and events. */
export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
