export { createLogger } from "./logger/index.js";
export type { Logger, LogLevel, LogData, LoggerOptions, PollContext } from "./logger/index.js";

export { formatZodError } from "./utils/validation.js";

export {
  PollerConfigSchema,
  ConnectionConfigSchema,
  DashboardConfigSchema,
} from "./utils/config-schema.js";
export type { PollerConfig, ConnectionConfig, DashboardConfig } from "./utils/config-schema.js";
