import crypto from "crypto";

import { ValidationError } from "@typesLocal/AppError";

export type DocumentMetadata = Record<string, unknown>;

/**
 * A stored unit of retrieval. Content and embedding always travel together;
 * the embedding is produced externally from the content.
 */
export interface Document {
  id: string;
  title: string;
  content: string;
  metadata: DocumentMetadata;
  embedding: number[];
}

/** A document as listings and search results see it: no vector. */
export type DocumentRecord = Omit<Document, "embedding">;

export interface ScoredDocument extends DocumentRecord {
  distance: number;
}

export interface DocumentInput {
  id?: string | undefined;
  title: string;
  content: string;
  metadata?: DocumentMetadata | undefined;
  embedding: number[];
}

export const MAX_DOCUMENT_ID_LENGTH = 255;

export function assertValidEmbedding(embedding: readonly number[]): void {
  if (!Array.isArray(embedding) || embedding.length === 0) {
    throw new ValidationError("Embedding must be a non-empty array of numbers");
  }

  if (!embedding.every((v) => typeof v === "number" && Number.isFinite(v))) {
    throw new ValidationError("Embedding contains a non-finite value");
  }
}

/**
 * Validates an incoming document and assigns an id when none is given.
 * Returns a fresh object; the input is not mutated.
 */
export function normalizeDocument(input: DocumentInput): Document {
  const id = input.id?.trim() || crypto.randomUUID();

  if (id.length > MAX_DOCUMENT_ID_LENGTH) {
    throw new ValidationError(
      `Document id exceeds ${MAX_DOCUMENT_ID_LENGTH} characters`
    );
  }

  if (!input.title?.trim()) {
    throw new ValidationError("Document title is required");
  }

  if (!input.content?.trim()) {
    throw new ValidationError("Document content is required");
  }

  assertValidEmbedding(input.embedding);

  return {
    id,
    title: input.title,
    content: input.content,
    metadata: { ...(input.metadata ?? {}) },
    embedding: [...input.embedding],
  };
}

export function toRecord(document: Document): DocumentRecord {
  return {
    id: document.id,
    title: document.title,
    content: document.content,
    metadata: document.metadata,
  };
}
