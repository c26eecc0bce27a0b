import { z } from "zod";
import { ValidationError } from "../errors";

// ============================================================================
// Webhook Schemas
// ============================================================================

export const setWebhookSchema = z.object({
  url: z
    .string()
    .url("URL must be valid")
    .refine((url) => url.startsWith("https://"), "Webhook URL must use https"),
});

// ============================================================================
// Validation Helper
// ============================================================================

/**
 * Validate input against a Zod schema
 * Throws ValidationError if validation fails
 */
export function validate<S extends z.ZodTypeAny>(
  schema: S,
  data: unknown,
): z.output<S> {
  const result = schema.safeParse(data);
  if (!result.success) {
    const errors = result.error.issues.map((e) => ({
      path: e.path.join("."),
      message: e.message,
    }));
    throw new ValidationError("Validation failed", { errors });
  }
  return result.data;
}
