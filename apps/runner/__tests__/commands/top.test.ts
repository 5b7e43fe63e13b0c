import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import type { Mock, MockInstance } from "vitest";
import type { DataRow, DataSource, EventBus } from "@plantop/sdk";
import { ManualScheduler, MockDataSource, makePlanCacheRow } from "@plantop/sdk/testing";
import { createDatabasePoller, MEMORY_STATUS_QUERY, PLANCACHE_QUERY } from "@plantop/core";
import type { PollerConfig } from "@plantop/shared";
import { TopCommand } from "../../src/commands/top.js";
import type { ParsedArgs } from "../../src/commands/base.js";
import type { MysqlDataSource } from "../../src/datasource/mysql-data-source.js";

function fakeSource(source: DataSource): MysqlDataSource & { close: Mock<() => Promise<void>> } {
  return {
    query: (sql) => source.query(sql),
    get: (sql) => source.get(sql),
    describe: () => "db1:3306",
    close: vi.fn(async () => {}),
  };
}

function args(flags: ParsedArgs["flags"]): ParsedArgs {
  return { command: "top", flags, positional: [] };
}

describe("TopCommand", () => {
  let consoleErrorSpy: MockInstance<typeof console.error>;

  beforeEach(() => {
    consoleErrorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("rejects an invalid config before connecting", async () => {
    const openSource = vi.fn();
    const command = new TopCommand({ openSource });

    const exitCode = await command.execute(args({ "update-interval": "0" }));

    expect(exitCode).toBe(1);
    expect(openSource).not.toHaveBeenCalled();
    expect(consoleErrorSpy).toHaveBeenCalledWith("[cli] Config validation failed:\n");
    expect(consoleErrorSpy).toHaveBeenCalledWith("  updateInterval must be positive");
  });

  it("closes the connection when the initial snapshot fails", async () => {
    const source = fakeSource(new MockDataSource().failWith(PLANCACHE_QUERY, new Error("Access denied")));
    const command = new TopCommand({
      openSource: () => source,
      createPoller: (src, bus, config) =>
        createDatabasePoller({ source: src, bus, scheduler: new ManualScheduler(), intervalSeconds: config.updateInterval }),
    });

    const exitCode = await command.execute(args({}));

    expect(exitCode).toBe(1);
    expect(source.close).toHaveBeenCalledTimes(1);
    expect(consoleErrorSpy).toHaveBeenCalledWith("[cli] Cannot start polling db1:3306: Query failed: Access denied");
  });

  it("polls until shutdown and then releases everything", async () => {
    const mock = new MockDataSource()
      .setRows(PLANCACHE_QUERY, [makePlanCacheRow({ plan_hash: "A", commits: 1 })])
      .setRows(MEMORY_STATUS_QUERY, [{ Value: "256 MB" }]);
    const source = fakeSource(mock);
    const scheduler = new ManualScheduler();
    const write = vi.fn();
    const seen: { bus?: EventBus; config?: PollerConfig } = {};

    let signal: (name: string) => void = () => {};
    const shutdown = new Promise<string>((resolve) => {
      signal = resolve;
    });

    const command = new TopCommand({
      openSource: () => source,
      createPoller: (src, bus, config, host) => {
        seen.bus = bus;
        seen.config = config;
        return createDatabasePoller({ source: src, bus, scheduler, intervalSeconds: config.updateInterval, host });
      },
      write,
      waitForShutdown: () => shutdown,
    });

    const running = command.execute(args({ "update-interval": "2" }));

    await vi.waitFor(() => {
      expect(scheduler.pendingDelays()).toEqual([2]);
    });
    mock.setRows(PLANCACHE_QUERY, [makePlanCacheRow({ plan_hash: "A", commits: 5 })]);
    scheduler.runNext();
    await vi.waitFor(() => {
      expect(write).toHaveBeenCalledTimes(1);
    });

    signal("SIGTERM");
    await expect(running).resolves.toBe(0);

    expect(seen.config?.updateInterval).toBe(2);
    expect(String(write.mock.calls[0][0]).split("\n")[0]).toBe("plantop db1:3306  cpu: 0.00  memory: 256.00 MB");
    expect(scheduler.pendingCount()).toBe(0);
    expect(source.close).toHaveBeenCalledTimes(1);
  });

  it("waits for the cycle in flight before closing the connection", async () => {
    const mock = new MockDataSource()
      .setRows(PLANCACHE_QUERY, [makePlanCacheRow({ plan_hash: "A", commits: 1 })])
      .setRows(MEMORY_STATUS_QUERY, [{ Value: "256 MB" }]);
    const source = fakeSource(mock);
    const scheduler = new ManualScheduler();
    const write = vi.fn();

    let signal: (name: string) => void = () => {};
    const shutdown = new Promise<string>((resolve) => {
      signal = resolve;
    });

    const command = new TopCommand({
      openSource: () => source,
      createPoller: (src, bus, config, host) =>
        createDatabasePoller({ source: src, bus, scheduler, intervalSeconds: config.updateInterval, host }),
      write,
      waitForShutdown: () => shutdown,
    });

    const running = command.execute(args({}));
    await vi.waitFor(() => {
      expect(scheduler.pendingCount()).toBe(1);
    });

    let release: (rows: readonly DataRow[]) => void = () => {};
    mock.setHandler(
      PLANCACHE_QUERY,
      () =>
        new Promise<readonly DataRow[]>((resolve) => {
          release = resolve;
        }),
    );
    scheduler.runNext();
    await vi.waitFor(() => {
      expect(mock.getCalls().filter((sql) => sql === PLANCACHE_QUERY)).toHaveLength(2);
    });

    signal("SIGINT");
    await vi.waitFor(() => {
      expect(consoleErrorSpy).toHaveBeenCalledWith("\n[cli] Shutting down (SIGINT)...");
    });
    expect(source.close).not.toHaveBeenCalled();

    release([makePlanCacheRow({ plan_hash: "A", commits: 3 })]);
    await expect(running).resolves.toBe(0);

    expect(write).toHaveBeenCalledTimes(1);
    expect(source.close).toHaveBeenCalledTimes(1);
    expect(write.mock.invocationCallOrder[0]).toBeLessThan(source.close.mock.invocationCallOrder[0]);
    expect(consoleErrorSpy).not.toHaveBeenCalledWith(expect.stringMatching(/sample failed/));
  });
});
