// EventBus
export { createEventBus } from "./bus/index.js";

// Plan cache sampling
export {
  PLANCACHE_QUERY,
  PlanCacheRowSchema,
  buildPlanCacheSnapshot,
  fetchPlanCacheSnapshot,
} from "./plancache/fetcher.js";
export type { PlanCacheRow } from "./plancache/fetcher.js";
export { diffPlanCache, normalizeDiffEntry, sumCpuUtilization } from "./plancache/diff.js";
export type { PlanCounterDelta } from "./plancache/diff.js";

// Server status
export {
  MEMORY_STATUS_QUERY,
  fetchServerMemoryUsage,
  parseServerMemoryValue,
} from "./status/server-memory.js";

// Poll orchestration
export { createDatabasePoller } from "./poller/database-poller.js";
export type {
  DatabasePoller,
  DatabasePollerDeps,
  PollerState,
  PollerCounter,
  PollerGauge,
} from "./poller/database-poller.js";
export { createTimerScheduler } from "./scheduling/timer-scheduler.js";

// Observability
export { createMetricsCollector } from "./observability/index.js";
export type { MetricsCollector, MetricsSnapshot } from "./observability/index.js";
