/**
 * Structured logger for the poller and the CLI.
 *
 * Entries go to stderr; stdout belongs to the dashboard. LOG_LEVEL sets
 * the threshold and LOG_FORMAT=json switches to one JSON object per line.
 * A poller tags its entries with the server it watches and the id of the
 * cycle in progress, so interleaved output can be split per host.
 */

import { performance } from "node:perf_hooks";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/** Which server and which poll cycle an entry belongs to. */
export interface PollContext {
  host?: string;
  cycleId?: string;
}

export interface LoggerOptions {
  /** Overrides LOG_LEVEL. */
  level?: LogLevel;
  context?: PollContext;
}

export type LogData = Record<string, unknown>;

export interface Logger {
  debug(message: string, data?: LogData): void;
  info(message: string, data?: LogData): void;
  warn(message: string, data?: LogData): void;
  error(message: string, data?: LogData): void;
  /** Merge into the context of every later entry. */
  setContext(ctx: PollContext): void;
  /** Start a timer; the returned function logs the elapsed ms at debug and returns it. */
  time(label: string): () => number;
}

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_PRIORITY;
}

function levelFromEnv(): LogLevel {
  const normalized = (process.env.LOG_LEVEL ?? "").toLowerCase();
  return isLogLevel(normalized) ? normalized : "info";
}

function hasData(data?: LogData): data is LogData {
  return data !== undefined && Object.keys(data).length > 0;
}

function jsonLine(level: LogLevel, module: string, context: PollContext, message: string, data?: LogData): string {
  return JSON.stringify({
    timestamp: new Date().toISOString(),
    level,
    module,
    host: context.host,
    cycle_id: context.cycleId,
    message,
    ...data,
  });
}

function textLine(level: LogLevel, module: string, context: PollContext, message: string, data?: LogData): string {
  const tags = [module];
  if (context.host) tags.push(`host=${context.host}`);
  if (context.cycleId) tags.push(`cycle=${context.cycleId}`);

  const line = `[${new Date().toISOString()}] [${level.toUpperCase()}] [${tags.join(" ")}] ${message}`;
  return hasData(data) ? `${line} ${JSON.stringify(data)}` : line;
}

export function createLogger(module: string, options: LoggerOptions = {}): Logger {
  const threshold = LEVEL_PRIORITY[options.level ?? levelFromEnv()];
  const format = process.env.LOG_FORMAT?.toLowerCase() === "json" ? jsonLine : textLine;
  let context: PollContext = { ...options.context };

  function log(level: LogLevel, message: string, data?: LogData): void {
    if (LEVEL_PRIORITY[level] < threshold) return;
    console.error(format(level, module, context, message, data));
  }

  return {
    debug: (message, data) => log("debug", message, data),
    info: (message, data) => log("info", message, data),
    warn: (message, data) => log("warn", message, data),
    error: (message, data) => log("error", message, data),

    setContext(ctx: PollContext): void {
      context = { ...context, ...ctx };
    },

    time(label: string): () => number {
      const start = performance.now();
      return () => {
        const durationMs = Math.round((performance.now() - start) * 100) / 100;
        log("debug", `${label} completed`, { label, durationMs });
        return durationMs;
      };
    },
  };
}
