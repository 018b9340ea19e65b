/**
 * POST /api/query: answer a question from the documents the caller may read.
 *
 * The response carries the search meta (attempts, candidates, outcome) so
 * clients can tell an unauthorized corpus from an exhausted one.
 */
import { getServices } from "@app/container";
import { QueryRequestSchema } from "@interfaces/http/query/schema";
import { parseRequest } from "@interfaces/http/validation";
import { getAuthenticatedUser } from "@middleware/auth";
import type { Request, Response } from "express";

export async function queryController(
  req: Request,
  res: Response
): Promise<void> {
  const user = getAuthenticatedUser(res);
  const body = parseRequest(QueryRequestSchema, req.body);

  const result = await getServices().query.query(user, body);

  res.json({
    answer: result.answer,
    sources: result.sources,
    meta: result.meta,
  });
}
