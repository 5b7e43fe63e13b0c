/**
 * Assemble the raw poller configuration from an optional JSON file and
 * CLI flag overrides. Validation happens separately.
 */

import { readFile } from "node:fs/promises";
import { existsSync } from "node:fs";
import { resolve } from "node:path";
import { ConfigError, describeError } from "@plantop/sdk";
import type { ParsedArgs } from "../commands/base.js";

export const DEFAULT_CONFIG_FILE = "plantop.json";

/** Flags that override a config file entry, mapped to their path. */
const FLAG_PATHS: ReadonlyArray<{ flag: string; path: [string] | [string, string]; numeric: boolean }> = [
  { flag: "host", path: ["connection", "host"], numeric: false },
  { flag: "port", path: ["connection", "port"], numeric: true },
  { flag: "user", path: ["connection", "user"], numeric: false },
  { flag: "password", path: ["connection", "password"], numeric: false },
  { flag: "database", path: ["connection", "database"], numeric: false },
  { flag: "update-interval", path: ["updateInterval"], numeric: true },
  { flag: "fetch-timeout", path: ["fetchTimeoutMs"], numeric: true },
  { flag: "max-rows", path: ["dashboard", "maxRows"], numeric: true },
  { flag: "sort-by", path: ["dashboard", "sortBy"], numeric: false },
];

type RawConfig = Record<string, unknown>;

function isRecord(value: unknown): value is RawConfig {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Resolve which config file to read, if any. */
export function resolveConfigPath(args: ParsedArgs, cwd: string = process.cwd()): string | undefined {
  const explicit = args.flags.config;
  if (typeof explicit === "string") return resolve(cwd, explicit);
  const fallback = resolve(cwd, DEFAULT_CONFIG_FILE);
  return existsSync(fallback) ? fallback : undefined;
}

/**
 * Read a JSON config file.
 *
 * @throws ConfigError when the file is unreadable, not JSON, or not an object.
 */
export async function readConfigFile(path: string): Promise<RawConfig> {
  let text: string;
  try {
    text = await readFile(path, "utf-8");
  } catch (err) {
    throw new ConfigError(`Cannot read config file ${path}: ${describeError(err)}`, { cause: err });
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    throw new ConfigError(`Config file ${path} is not valid JSON: ${describeError(err)}`, { cause: err });
  }

  if (!isRecord(json)) {
    throw new ConfigError(`Config file ${path} must contain a JSON object`);
  }
  return json;
}

function flagValue(value: string | boolean, numeric: boolean): unknown {
  if (numeric && typeof value === "string") return Number(value);
  return value;
}

/** Overlay CLI flags on a raw config object without mutating it. */
export function applyFlagOverrides(base: RawConfig, flags: ParsedArgs["flags"]): RawConfig {
  const merged: RawConfig = { ...base };

  for (const { flag, path, numeric } of FLAG_PATHS) {
    const value = flags[flag];
    if (value === undefined) continue;

    if (path.length === 1) {
      merged[path[0]] = flagValue(value, numeric);
      continue;
    }

    const [section, key] = path;
    const current = merged[section];
    merged[section] = { ...(isRecord(current) ? current : {}), [key]: flagValue(value, numeric) };
  }

  return merged;
}

/** Load the config file (if any) and apply flag overrides. */
export async function loadRawConfig(args: ParsedArgs, cwd?: string): Promise<{ raw: RawConfig; path?: string }> {
  const path = resolveConfigPath(args, cwd);
  const base = path ? await readConfigFile(path) : {};
  return { raw: applyFlagOverrides(base, args.flags), path };
}
