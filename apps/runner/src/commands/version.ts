/**
 * Version command - display version information.
 */

import { existsSync, readFileSync } from "node:fs";
import { z } from "zod";
import type { CliCommand, CommandOption, ExitCode, ParsedArgs } from "./base.js";

const PackageJsonSchema = z.object({ version: z.string() });

/** Beside the sources, or under dist/ after a build. */
const PACKAGE_JSON_CANDIDATES = ["../../package.json", "../../../../../apps/runner/package.json"];

function findPackageJson(): URL {
  for (const candidate of PACKAGE_JSON_CANDIDATES) {
    const url = new URL(candidate, import.meta.url);
    if (existsSync(url)) return url;
  }
  throw new Error("package.json not found");
}

export class VersionCommand implements CliCommand {
  name = "version";
  description = "Display version information";
  options: readonly CommandOption[] = [{ flag: "--verbose", description: "Also print Node.js and platform" }];

  async execute(args: ParsedArgs): Promise<ExitCode> {
    try {
      const pkg = PackageJsonSchema.parse(JSON.parse(readFileSync(findPackageJson(), "utf-8")));

      console.log(`plantop v${pkg.version}`);

      if (args.flags.verbose) {
        console.log(`Node.js ${process.version}`);
        console.log(`Platform: ${process.platform} ${process.arch}`);
      }

      return 0;
    } catch (err) {
      console.error(`Failed to read version information: ${err instanceof Error ? err.message : String(err)}`);
      return 1;
    }
  }
}
