import { ValidationError } from "@typesLocal/AppError";
import type { z } from "zod";

/** Parses a request part, turning zod issues into a 400 ValidationError. */
export function parseRequest<S extends z.ZodTypeAny>(
  schema: S,
  input: unknown,
  message = "Invalid request"
): z.infer<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ValidationError(message, {
      issues: result.error.issues.map((issue) => ({
        path: issue.path.join("."),
        message: issue.message,
      })),
    });
  }
  return result.data;
}
