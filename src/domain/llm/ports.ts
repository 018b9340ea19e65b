/**
 * Domain ports for the model-backed collaborators.
 *
 * Neither is retried or cached by the core; failures propagate as a failed
 * ingest or query.
 */
import type { DocumentRecord } from "@domain/documents/document";

export interface EmbeddingPort {
  /** Fixed-length vector for `text`. Called once per document and once per query. */
  embed(text: string): Promise<number[]>;
}

export interface AnswerGeneratorPort {
  generate(question: string, documents: readonly DocumentRecord[]): Promise<string>;
}
