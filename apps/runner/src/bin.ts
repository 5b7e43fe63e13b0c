#!/usr/bin/env node

/**
 * plantop entry point: CLI subcommand router.
 *
 * Supports:
 *   - plantop top [--config <path>] [--host <host>] ...
 *   - plantop version [--verbose]
 *   - plantop (no args) → defaults to "top"
 */

import { parseArgs } from "./utils/args.js";
import { formatHelp } from "./commands/base.js";
import type { CliCommand } from "./commands/base.js";
import { TopCommand } from "./commands/top.js";
import { VersionCommand } from "./commands/version.js";

async function main(): Promise<number> {
  const parsed = parseArgs(process.argv.slice(2));
  const commands: CliCommand[] = [new TopCommand(), new VersionCommand()];

  if (parsed.flags.help === true || parsed.flags.h === true) {
    for (const line of formatHelp(commands)) {
      console.log(line);
    }
    return 0;
  }

  const command = parsed.command === "" ? commands[0] : commands.find((cmd) => cmd.name === parsed.command);
  if (!command) {
    console.error(`Unknown command: ${parsed.command}`);
    console.error(`Available commands: ${commands.map((cmd) => cmd.name).join(", ")}`);
    return 1;
  }

  return command.execute(parsed);
}

// CLI entry point
main()
  .then((exitCode) => process.exit(exitCode))
  .catch((err: unknown) => {
    console.error("Fatal error:", err);
    process.exit(1);
  });
