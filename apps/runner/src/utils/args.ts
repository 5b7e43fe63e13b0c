/**
 * CLI argument parser.
 *
 * Hand-rolled minimal parser - no external CLI framework needed.
 */

import type { ParsedArgs } from "../commands/base.js";

/**
 * Parse CLI arguments into structured ParsedArgs.
 *
 * Supported formats:
 *   - Long flag with value: --host db.internal
 *   - Long flag with inline value: --port=3307
 *   - Boolean flag: --verbose
 *   - Short flag: -h (treated as boolean)
 *   - Command: first non-flag argument
 *   - Positional: remaining non-flag arguments
 *
 * Examples:
 *   parseArgs(["top", "--host", "db1"]) → { command: "top", flags: { host: "db1" }, positional: [] }
 *   parseArgs(["--update-interval=5"]) → { command: "", flags: { "update-interval": "5" }, positional: [] }
 */
export function parseArgs(argv: string[]): ParsedArgs {
  const flags: Record<string, string | boolean> = {};
  const positional: string[] = [];
  let command = "";

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg.startsWith("--") && arg.includes("=")) {
      const eq = arg.indexOf("=");
      flags[arg.slice(2, eq)] = arg.slice(eq + 1);
      continue;
    }

    const next = argv[i + 1];
    if (arg.startsWith("--") && next !== undefined && !next.startsWith("-")) {
      flags[arg.slice(2)] = next;
      i++;
      continue;
    }

    if (arg.startsWith("--")) {
      flags[arg.slice(2)] = true;
      continue;
    }

    if (arg.startsWith("-") && arg.length === 2) {
      flags[arg.slice(1)] = true;
      continue;
    }

    if (!command && !arg.startsWith("-")) {
      command = arg;
      continue;
    }

    if (!arg.startsWith("-")) {
      positional.push(arg);
    }
  }

  return { command, flags, positional };
}
