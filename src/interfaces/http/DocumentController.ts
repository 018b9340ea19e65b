/**
 * Document HTTP controllers.
 *
 * - POST /api/documents: validate, embed and upsert one document.
 * - GET /api/documents: list what the authenticated user may see.
 * - DELETE /api/documents/:id: remove a document and its vector.
 */
import { getServices } from "@app/container";
import {
  AddDocumentRequestSchema,
  DocumentIdParamsSchema,
} from "@interfaces/http/documents/schema";
import { parseRequest } from "@interfaces/http/validation";
import { getAuthenticatedUser } from "@middleware/auth";
import type { Request, Response } from "express";

export async function addDocumentController(
  req: Request,
  res: Response
): Promise<void> {
  const body = parseRequest(AddDocumentRequestSchema, req.body);
  const { id } = await getServices().documents.addDocument(body);

  res.status(201).json({ id, message: "Document added successfully" });
}

export async function listDocumentsController(
  _req: Request,
  res: Response
): Promise<void> {
  const user = getAuthenticatedUser(res);
  const documents = await getServices().documents.listDocuments(user);

  res.json({ documents, count: documents.length, user });
}

export async function deleteDocumentController(
  req: Request,
  res: Response
): Promise<void> {
  const { id } = parseRequest(DocumentIdParamsSchema, req.params);
  await getServices().documents.deleteDocument(id);

  res.json({ id, message: "Document deleted successfully" });
}
