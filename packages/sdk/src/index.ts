// Types
export type {
  PlanIdentity,
  PlanCounterRecord,
  PlanCounterSnapshot,
  IntervalMetricRecord,
  IntervalMetricField,
  PlanCacheDiff,
} from "./types/plancache.js";

export { INTERVAL_METRIC_FIELDS } from "./types/plancache.js";

export type {
  DataRow,
  DataSource,
  ScheduledTask,
  Scheduler,
} from "./types/data-source.js";

export type {
  EventHandler,
  EventBus,
  PollerEvent,
  PollerEventTypeValue,
  PollStage,
  PollErrorPayload,
  PlanCacheChangedEvent,
  CpuUtilChangedEvent,
  MemUsageChangedEvent,
  PollErrorEvent,
} from "./types/events.js";

export { PollerEventType } from "./types/events.js";

// Errors
export {
  PlantopError,
  QueryError,
  MalformedStatusRowError,
  DegenerateIntervalError,
  ConfigError,
  describeError,
} from "./errors/base.js";
