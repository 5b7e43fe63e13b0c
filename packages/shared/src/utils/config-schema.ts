/**
 * Zod schema for plantop.json runtime validation.
 *
 * Every field has a default, so an empty object is a complete config
 * pointing at a local server.
 */

import { z } from "zod";
import { INTERVAL_METRIC_FIELDS } from "@plantop/sdk";

export const ConnectionConfigSchema = z.object({
  host: z.string().min(1, "Host must not be empty").default("127.0.0.1"),
  port: z.number().int().min(1).max(65535).default(3306),
  user: z.string().min(1, "User must not be empty").default("root"),
  password: z.string().default(""),
  database: z.string().min(1).optional(),
});

export const DashboardConfigSchema = z.object({
  maxRows: z.number().int().positive().default(20),
  sortBy: z.enum(INTERVAL_METRIC_FIELDS).default("cpuUtilization"),
});

export const PollerConfigSchema = z.object({
  connection: ConnectionConfigSchema.default({}),
  /** Seconds between polls; also the rate denominator. */
  updateInterval: z.number().positive("updateInterval must be positive").finite().default(3),
  fetchTimeoutMs: z.number().int().positive().optional(),
  dashboard: DashboardConfigSchema.default({}),
});

export type ConnectionConfig = z.infer<typeof ConnectionConfigSchema>;
export type DashboardConfig = z.infer<typeof DashboardConfigSchema>;
export type PollerConfig = z.infer<typeof PollerConfigSchema>;
