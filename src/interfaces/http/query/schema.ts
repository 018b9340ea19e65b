import { z } from "zod";

export const QueryRequestSchema = z.object({
  question: z.string().trim().min(1, "question is required"),
  topK: z.number().int().positive().optional(),
});
