/**
 * DatabasePoller: drives one fetch → diff → emit cycle per tick.
 *
 * State machine:
 *   IDLE (holding the last snapshot) → POLLING → IDLE
 *   any → STOPPED (via stop())
 *
 * Each poll() re-arms the next tick before doing anything else, so the
 * cadence survives slow or failing cycles. A tick that fires while a
 * cycle is in flight joins that cycle instead of starting a second
 * fetch; the retained snapshot therefore has a single writer.
 *
 * Rates are divided by the seconds that actually elapsed between the two
 * snapshots being compared, measured when each fetch completed. After a
 * failed fetch the retained snapshot is older than one interval, and the
 * next diff spans all of that time.
 *
 * A failed plan cache fetch keeps the previous snapshot and skips the
 * plan cache and CPU events for that cycle. Memory sampling is
 * independent: either step can fail without suppressing the other.
 */

import type {
  DataSource,
  EventBus,
  PlanCounterSnapshot,
  PollStage,
  ScheduledTask,
  Scheduler,
} from "@plantop/sdk";
import { DegenerateIntervalError, PollerEventType, QueryError, describeError } from "@plantop/sdk";
import { randomUUID } from "node:crypto";
import { createLogger } from "@plantop/shared";
import { fetchPlanCacheSnapshot, PLANCACHE_QUERY } from "../plancache/fetcher.js";
import { diffPlanCache, sumCpuUtilization } from "../plancache/diff.js";
import { fetchServerMemoryUsage, MEMORY_STATUS_QUERY } from "../status/server-memory.js";
import { createMetricsCollector } from "../observability/index.js";
import type { MetricsSnapshot } from "../observability/index.js";

export type PollerState = "IDLE" | "POLLING" | "STOPPED";

export type PollerCounter =
  | "poll.cycles"
  | "poll.fetch_failures"
  | "poll.memory_failures"
  | "poll.coalesced";

export type PollerGauge =
  | "plancache.entries"
  | "plancache.active_plans"
  | "cpu.total_utilization"
  | "memory.server_usage";

export interface DatabasePollerDeps {
  source: DataSource;
  bus: EventBus;
  scheduler: Scheduler;
  /** Seconds between scheduled polls. */
  intervalSeconds: number;
  /** Treat a query that has not settled within this many ms as failed. */
  fetchTimeoutMs?: number;
  /** Label for log entries, e.g. "db.internal:3306". */
  host?: string;
  /** Milliseconds clock used to time snapshots. Defaults to Date.now. */
  clock?: () => number;
}

export interface DatabasePoller {
  /** Arm the first tick. */
  start(): void;
  /**
   * Cancel the pending tick. An in-flight cycle still completes; the
   * returned promise settles once it has.
   */
  stop(): Promise<void>;
  /** Run one cycle (or join the one in flight). Never rejects. */
  poll(): Promise<void>;
  getState(): PollerState;
  getMetrics(): MetricsSnapshot<PollerCounter, PollerGauge>;
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

async function withTimeout<T>(work: Promise<T>, sql: string, timeoutMs?: number): Promise<T> {
  if (timeoutMs === undefined) return work;

  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(
      () => reject(new QueryError(sql, `timed out after ${timeoutMs}ms`, { code: "QUERY_TIMEOUT" })),
      timeoutMs,
    );
  });
  try {
    return await Promise.race([work, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Create a poller holding the current plan cache as its first snapshot.
 *
 * @throws DegenerateIntervalError when intervalSeconds is not a positive finite number.
 * @throws QueryError when the initial snapshot cannot be fetched.
 */
export async function createDatabasePoller(deps: DatabasePollerDeps): Promise<DatabasePoller> {
  const { source, bus, scheduler, intervalSeconds, fetchTimeoutMs, clock = Date.now } = deps;
  if (!Number.isFinite(intervalSeconds) || intervalSeconds <= 0) {
    throw new DegenerateIntervalError(intervalSeconds);
  }
  const logger = createLogger("DatabasePoller", { context: { host: deps.host } });

  let snapshot: PlanCounterSnapshot = await withTimeout(
    fetchPlanCacheSnapshot(source),
    PLANCACHE_QUERY,
    fetchTimeoutMs,
  );
  let snapshotTakenAt = clock();
  logger.info("Initial plan cache snapshot taken", { plans: snapshot.size, intervalSeconds });

  let state: PollerState = "IDLE";
  let pending: ScheduledTask | undefined;
  let inFlight: Promise<void> | undefined;
  const metrics = createMetricsCollector<PollerCounter, PollerGauge>();
  metrics.gauge("plancache.entries", snapshot.size);

  function reportFailure(stage: PollStage, err: unknown): void {
    const error = toError(err);
    metrics.increment(stage === "plancache" ? "poll.fetch_failures" : "poll.memory_failures");
    logger.warn(`${stage} sampling failed`, { error: describeError(error) });
    bus.emit({
      type: PollerEventType.POLL_ERROR,
      timestamp: Date.now(),
      payload: { stage, error },
    });
  }

  async function samplePlanCache(): Promise<void> {
    let next: PlanCounterSnapshot;
    try {
      next = await withTimeout(fetchPlanCacheSnapshot(source), PLANCACHE_QUERY, fetchTimeoutMs);
    } catch (err) {
      reportFailure("plancache", err);
      return;
    }

    const takenAt = clock();
    const elapsedSeconds = (takenAt - snapshotTakenAt) / 1000;
    // A clock that stood still or stepped back cannot time the interval.
    const denominator = elapsedSeconds > 0 ? elapsedSeconds : intervalSeconds;

    const diff = diffPlanCache(next, snapshot, denominator);
    bus.emit({ type: PollerEventType.PLANCACHE_CHANGED, timestamp: Date.now(), payload: diff });
    snapshot = next;
    snapshotTakenAt = takenAt;

    const cpuUtil = sumCpuUtilization(diff);
    bus.emit({ type: PollerEventType.CPU_UTIL_CHANGED, timestamp: Date.now(), payload: cpuUtil });

    metrics.gauge("plancache.entries", next.size);
    metrics.gauge("plancache.active_plans", diff.size);
    metrics.gauge("cpu.total_utilization", cpuUtil);
  }

  async function sampleMemory(): Promise<void> {
    let usage: number;
    try {
      usage = await withTimeout(fetchServerMemoryUsage(source), MEMORY_STATUS_QUERY, fetchTimeoutMs);
    } catch (err) {
      reportFailure("memory", err);
      return;
    }

    bus.emit({ type: PollerEventType.MEM_USAGE_CHANGED, timestamp: Date.now(), payload: usage });
    metrics.gauge("memory.server_usage", usage);
  }

  async function runCycle(): Promise<void> {
    state = "POLLING";
    logger.setContext({ cycleId: randomUUID().slice(0, 8) });
    const stopTimer = logger.time("poll cycle");
    metrics.increment("poll.cycles");

    try {
      await samplePlanCache();
      await sampleMemory();
    } finally {
      stopTimer();
      if (state === "POLLING") {
        state = "IDLE";
      }
    }
  }

  function tick(): void {
    poller.poll().catch((err: unknown) => {
      logger.error("Poll cycle crashed", { error: describeError(err) });
    });
  }

  function arm(): void {
    pending?.cancel();
    pending = scheduler.schedule(intervalSeconds, tick);
  }

  const poller: DatabasePoller = {
    start(): void {
      if (state === "STOPPED") return;
      arm();
    },

    stop(): Promise<void> {
      pending?.cancel();
      pending = undefined;
      state = "STOPPED";
      logger.info("Poller stopped", { cycleInFlight: inFlight !== undefined });
      return inFlight ?? Promise.resolve();
    },

    poll(): Promise<void> {
      if (state === "STOPPED") return Promise.resolve();
      arm();

      if (inFlight) {
        metrics.increment("poll.coalesced");
        logger.debug("Cycle already in flight, joining it");
        return inFlight;
      }

      inFlight = runCycle().finally(() => {
        inFlight = undefined;
      });
      return inFlight;
    },

    getState(): PollerState {
      return state;
    },

    getMetrics(): MetricsSnapshot<PollerCounter, PollerGauge> {
      return metrics.getSnapshot();
    },
  };

  return poller;
}
