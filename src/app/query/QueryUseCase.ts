/**
 * Retrieval-augmented answering over the documents a user may see.
 *
 * 1. Embed the question.
 * 2. Run the filtered KNN search with the user's permission predicate.
 * 3. Ask the answer generator, giving it only the authorized documents.
 */
import type { ScoredDocument } from "@domain/documents/document";
import type { AnswerGeneratorPort, EmbeddingPort } from "@domain/llm/ports";
import {
  accessPredicate,
  type PermissionChecker,
} from "@domain/permissions/ports";
import type {
  FilteredSearchEngine,
  FilteredSearchMeta,
} from "@domain/retrieval/filteredSearch";
import { logEvent } from "@infrastructure/logging/Logger";
import { ValidationError } from "@typesLocal/AppError";

export interface QueryRequest {
  question: string;
  topK?: number | undefined;
}

export interface QueryResult {
  answer: string;
  sources: ScoredDocument[];
  meta: FilteredSearchMeta;
}

export interface QueryUseCaseDeps {
  engine: FilteredSearchEngine;
  embedder: EmbeddingPort;
  answers: AnswerGeneratorPort;
  permissions: PermissionChecker;
  defaultTopK: number;
  maxTopK: number;
}

export class QueryUseCase {
  constructor(private readonly deps: QueryUseCaseDeps) {}

  resolveTopK(requested: number | undefined): number {
    if (requested === undefined) {
      return Math.min(this.deps.defaultTopK, this.deps.maxTopK);
    }
    if (!Number.isInteger(requested) || requested < 1) {
      throw new ValidationError("topK must be a positive integer", {
        topK: requested,
      });
    }
    return Math.min(requested, this.deps.maxTopK);
  }

  async query(username: string, request: QueryRequest): Promise<QueryResult> {
    const question = request.question.trim();
    if (!question) {
      throw new ValidationError("Question is required");
    }

    const topK = this.resolveTopK(request.topK);
    const startedAt = Date.now();

    const queryEmbedding = await this.deps.embedder.embed(question);

    const { documents, meta } = await this.deps.engine.searchWithMeta(
      queryEmbedding,
      topK,
      accessPredicate(this.deps.permissions, username)
    );

    const answer = await this.deps.answers.generate(question, documents);

    logEvent("QUERY_SUCCESS", {
      username,
      topK,
      sources: documents.length,
      outcome: meta.outcome,
      attempts: meta.attempts,
      durationMs: Date.now() - startedAt,
    });

    return { answer, sources: documents, meta };
  }
}
