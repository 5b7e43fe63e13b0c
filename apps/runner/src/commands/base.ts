/**
 * Shared shapes for plantop's subcommands.
 */

export interface ParsedArgs {
  /** First bare word, or "" when the user typed only flags. */
  command: string;
  flags: Record<string, string | boolean>;
  positional: string[];
}

/** 0 on a clean exit (including shutdown by signal), 1 on any failure. */
export type ExitCode = 0 | 1;

export interface CommandOption {
  /** As typed, with a placeholder for the value: "--host <host>". */
  flag: string;
  description: string;
}

export interface CliCommand {
  name: string;
  /** One line for the command list in --help. */
  description: string;
  /** Flags the command reads, listed under it in --help. */
  options: readonly CommandOption[];
  execute(args: ParsedArgs): Promise<ExitCode>;
}

/** Render --help from the registered commands; the first one is the default. */
export function formatHelp(commands: readonly CliCommand[]): string[] {
  const lines = ["plantop - live view of the busiest query plans", "", "Usage: plantop [command] [options]", ""];
  const flagWidth = Math.max(
    "--help, -h".length,
    ...commands.flatMap((cmd) => cmd.options.map((opt) => opt.flag.length)),
  );

  commands.forEach((cmd, index) => {
    const suffix = index === 0 ? " (default)" : "";
    lines.push(`${cmd.name}${suffix}: ${cmd.description}`);
    for (const opt of cmd.options) {
      lines.push(`  ${opt.flag.padEnd(flagWidth)}  ${opt.description}`);
    }
    lines.push("");
  });

  lines.push(`  ${"--help, -h".padEnd(flagWidth)}  Show this help message`);
  return lines;
}
