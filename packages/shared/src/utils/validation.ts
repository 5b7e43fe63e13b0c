/**
 * Zod error formatting.
 */

import type { ZodError } from "zod";

/** Flatten a ZodError into "path: message" pairs joined by "; ". */
export function formatZodError(error: ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
      return `${path}${issue.message}`;
    })
    .join("; ");
}
