export { createMetricsCollector } from "./metrics.js";
export type { MetricsCollector, MetricsSnapshot } from "./metrics.js";
