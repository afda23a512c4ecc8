import type { Context } from "hono";
import type { ZodError } from "zod";

type ValidationResult = { success: true } | { success: false; error: ZodError };

/**
 * zValidator hook answering invalid input with 400 and the zod issues
 */
export function validationHook(result: ValidationResult, c: Context) {
  if (!result.success) {
    return c.json({ error: "Validation failed", issues: result.error.issues }, 400);
  }
}
