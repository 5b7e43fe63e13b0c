/**
 * Top command - poll a cluster's plan cache and draw the dashboard until
 * interrupted.
 */

import { PollerEventType, describeError } from "@plantop/sdk";
import type { DataSource, EventBus } from "@plantop/sdk";
import { createDatabasePoller, createEventBus, createTimerScheduler } from "@plantop/core";
import type { DatabasePoller } from "@plantop/core";
import type { PollerConfig } from "@plantop/shared";
import type { CliCommand, CommandOption, ExitCode, ParsedArgs } from "./base.js";
import { loadRawConfig } from "../utils/config-loader.js";
import { validateConfig } from "../utils/config-validator.js";
import type { ConfigValidationError } from "../utils/config-validator.js";
import { createMysqlDataSource } from "../datasource/mysql-data-source.js";
import type { MysqlDataSource } from "../datasource/mysql-data-source.js";
import { createDashboard } from "../dashboard/dashboard.js";
import type { DashboardWriter } from "../dashboard/dashboard.js";

export interface TopCommandDeps {
  /** Build the data source for a validated config. */
  openSource?: (config: PollerConfig) => MysqlDataSource;
  /** Build the poller; defaults to a timer-driven one. */
  createPoller?: (source: DataSource, bus: EventBus, config: PollerConfig, host: string) => Promise<DatabasePoller>;
  write?: DashboardWriter;
  /** Resolves with the signal name that should stop the command. */
  waitForShutdown?: () => Promise<string>;
}

function waitForSignal(): Promise<string> {
  return new Promise((resolve) => {
    process.once("SIGINT", () => resolve("SIGINT"));
    process.once("SIGTERM", () => resolve("SIGTERM"));
  });
}

export class TopCommand implements CliCommand {
  name = "top";
  description = "Show the busiest query plans, refreshed every interval";
  options: readonly CommandOption[] = [
    { flag: "--config <path>", description: "Config file (default: ./plantop.json if present)" },
    { flag: "--host <host>", description: "Server host (default: 127.0.0.1)" },
    { flag: "--port <port>", description: "Server port (default: 3306)" },
    { flag: "--user <user>", description: "User name (default: root)" },
    { flag: "--password <password>", description: "Password (default: empty)" },
    { flag: "--database <name>", description: "Default database" },
    { flag: "--update-interval <secs>", description: "Seconds between polls (default: 3)" },
    { flag: "--fetch-timeout <ms>", description: "Fail a query that takes longer than this" },
    { flag: "--max-rows <n>", description: "Plans shown in the dashboard (default: 20)" },
    { flag: "--sort-by <field>", description: "Column to sort by (default: cpuUtilization)" },
  ];

  constructor(private readonly deps: TopCommandDeps = {}) {}

  async execute(args: ParsedArgs): Promise<ExitCode> {
    // 1. Load config
    let raw: unknown;
    try {
      const loaded = await loadRawConfig(args);
      raw = loaded.raw;
      if (loaded.path) {
        console.error(`[cli] Loaded config: ${loaded.path}`);
      }
    } catch (err) {
      console.error(`[cli] ${describeError(err)}`);
      return 1;
    }

    // 2. Validate config
    const validation = validateConfig(raw);
    if (!validation.valid || !validation.config) {
      this.printValidationErrors(validation.errors ?? []);
      return 1;
    }
    for (const w of validation.errors ?? []) {
      console.warn(`[cli] Warning: ${w.message} (${w.path})`);
    }
    const config = validation.config;

    // 3. Wire source, bus and dashboard
    const source = (this.deps.openSource ?? ((c: PollerConfig) => createMysqlDataSource(c.connection)))(config);
    const host = source.describe();
    const bus = createEventBus();
    const dashboard = createDashboard(bus, host, config.dashboard, this.deps.write);

    bus.on(PollerEventType.POLL_ERROR, (event) => {
      if (event.type === PollerEventType.POLL_ERROR) {
        console.error(`[cli] ${event.payload.stage} sample failed: ${event.payload.error.message}`);
      }
    });

    // 4. Initial snapshot
    let poller: DatabasePoller;
    try {
      const create = this.deps.createPoller ?? defaultPoller;
      poller = await create(source, bus, config, host);
    } catch (err) {
      console.error(`[cli] Cannot start polling ${host}: ${describeError(err)}`);
      dashboard.dispose();
      await source.close();
      return 1;
    }

    // 5. Poll until shutdown signal
    poller.start();
    const signal = await (this.deps.waitForShutdown ?? waitForSignal)();
    console.error(`\n[cli] Shutting down (${signal})...`);
    await poller.stop();
    dashboard.dispose();
    try {
      await source.close();
    } catch (err) {
      console.error(`[cli] Failed to close connection: ${describeError(err)}`);
      return 1;
    }
    return 0;
  }

  private printValidationErrors(errors: ConfigValidationError[]): void {
    console.error("[cli] Config validation failed:\n");

    for (const err of errors) {
      const severity = err.severity.toUpperCase();
      console.error(`${severity}: ${err.path}`);
      console.error(`  ${err.message}`);
      if (err.suggestion) {
        console.error(`  Suggestion: ${err.suggestion}`);
      }
      console.error("");
    }

    console.error("Fix these errors and try again.");
  }
}

function defaultPoller(source: DataSource, bus: EventBus, config: PollerConfig, host: string): Promise<DatabasePoller> {
  return createDatabasePoller({
    source,
    bus,
    scheduler: createTimerScheduler(),
    intervalSeconds: config.updateInterval,
    fetchTimeoutMs: config.fetchTimeoutMs,
    host,
  });
}
