import { z } from "zod";

/**
 * Request DTOs for the document endpoints.
 *
 * The embedding is never accepted from clients; it is computed from `content`.
 */
export const AddDocumentRequestSchema = z.object({
  id: z.string().trim().min(1).max(255).optional(),
  title: z.string().trim().min(1, "title is required"),
  content: z.string().trim().min(1, "content is required"),
  metadata: z.record(z.string(), z.unknown()).optional(),
});

export const DocumentIdParamsSchema = z.object({
  id: z.string().trim().min(1).max(255),
});
