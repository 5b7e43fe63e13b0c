/**
 * Config validation with detailed error reporting.
 *
 * Validates the poller configuration using the Zod schema plus semantic
 * checks that only warn.
 */

import type { ZodError } from "zod";
import { PollerConfigSchema } from "@plantop/shared";
import type { PollerConfig } from "@plantop/shared";

/**
 * Individual validation error with context.
 */
export interface ConfigValidationError {
  /** Error path (e.g., "connection.port") */
  path: string;

  message: string;

  severity: "error" | "warning";

  suggestion?: string;
}

export interface ConfigValidationResult {
  valid: boolean;

  /** Validated config with defaults applied (only if valid) */
  config?: PollerConfig;

  /** Errors, or warnings when valid */
  errors?: ConfigValidationError[];
}

/**
 * Validate poller configuration with Zod schema + semantic rules.
 */
export function validateConfig(config: unknown): ConfigValidationResult {
  const result = PollerConfigSchema.safeParse(config);
  if (!result.success) {
    return {
      valid: false,
      errors: parseZodErrors(result.error),
    };
  }

  const warnings = validateSemantics(result.data);
  return {
    valid: true,
    config: result.data,
    errors: warnings.length > 0 ? warnings : undefined,
  };
}

function validateSemantics(config: PollerConfig): ConfigValidationError[] {
  const warnings: ConfigValidationError[] = [];

  if (config.updateInterval < 1) {
    warnings.push({
      path: "updateInterval",
      message: `Polling every ${config.updateInterval}s runs the plan cache query more than once per second`,
      severity: "warning",
      suggestion: "Use an interval of at least 1 second on busy clusters",
    });
  }

  if (config.fetchTimeoutMs !== undefined && config.fetchTimeoutMs >= config.updateInterval * 1000) {
    warnings.push({
      path: "fetchTimeoutMs",
      message: "Fetch timeout is not shorter than the update interval; slow cycles will absorb later ticks",
      severity: "warning",
      suggestion: `Set fetchTimeoutMs below ${config.updateInterval * 1000}`,
    });
  }

  return warnings;
}

function parseZodErrors(zodError: ZodError): ConfigValidationError[] {
  return zodError.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
    severity: "error" as const,
  }));
}
