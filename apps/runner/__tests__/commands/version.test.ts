import { describe, it, expect, vi, afterEach } from "vitest";
import { readFileSync } from "node:fs";
import { VersionCommand } from "../../src/commands/version.js";
import type { ParsedArgs } from "../../src/commands/base.js";

const pkg: unknown = JSON.parse(readFileSync(new URL("../../package.json", import.meta.url), "utf-8"));
const expectedVersion = typeof pkg === "object" && pkg !== null && "version" in pkg ? String(pkg.version) : "";

describe("VersionCommand", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should display version", async () => {
    const command = new VersionCommand();
    const consoleSpy = vi.spyOn(console, "log").mockImplementation(() => {});

    const args: ParsedArgs = { command: "version", flags: {}, positional: [] };
    const exitCode = await command.execute(args);

    expect(exitCode).toBe(0);
    expect(consoleSpy).toHaveBeenCalledTimes(1);
    expect(consoleSpy).toHaveBeenCalledWith(`plantop v${expectedVersion}`);
  });

  it("should display verbose information when --verbose flag is set", async () => {
    const command = new VersionCommand();
    const consoleSpy = vi.spyOn(console, "log").mockImplementation(() => {});

    const args: ParsedArgs = { command: "version", flags: { verbose: true }, positional: [] };
    await command.execute(args);

    expect(consoleSpy).toHaveBeenCalledWith(`Node.js ${process.version}`);
    expect(consoleSpy).toHaveBeenCalledWith(`Platform: ${process.platform} ${process.arch}`);
  });
});
