import type { z } from "zod";

/**
 * Formats a Zod error into a readable string
 */
export function formatZodError(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.map(String).join(".");
      return `  - ${path || "root"}: ${issue.message}`;
    })
    .join("\n");
}
