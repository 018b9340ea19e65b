/**
 * Document management: ingestion, permission-filtered listing and deletion.
 *
 * Content is embedded here, then written through the UpsertCoordinator so the
 * metadata row and its vector land together.
 */
import type { DocumentMetadata, DocumentRecord } from "@domain/documents/document";
import type {
  DocumentPredicate,
  DocumentStore,
} from "@domain/documents/ports";
import { UpsertCoordinator } from "@domain/documents/upsertCoordinator";
import type { EmbeddingPort } from "@domain/llm/ports";
import {
  accessPredicate,
  type PermissionChecker,
} from "@domain/permissions/ports";
import { logEvent } from "@infrastructure/logging/Logger";
import { DocumentNotFoundError } from "@typesLocal/AppError";

export interface AddDocumentRequest {
  id?: string | undefined;
  title: string;
  content: string;
  metadata?: DocumentMetadata | undefined;
}

export interface DocumentUseCaseDeps {
  store: DocumentStore;
  embedder: EmbeddingPort;
  permissions: PermissionChecker;
}

export class DocumentUseCase {
  private readonly coordinator: UpsertCoordinator;

  constructor(private readonly deps: DocumentUseCaseDeps) {
    this.coordinator = new UpsertCoordinator(deps.store);
  }

  async addDocument(input: AddDocumentRequest): Promise<{ id: string }> {
    const embedding = await this.deps.embedder.embed(input.content);

    const id = await this.coordinator.upsert({
      id: input.id,
      title: input.title,
      content: input.content,
      metadata: input.metadata,
      embedding,
    });

    return { id };
  }

  listFiltered(predicate: DocumentPredicate): Promise<DocumentRecord[]> {
    return this.deps.store.metadata.getFiltered(predicate);
  }

  async listDocuments(username: string): Promise<DocumentRecord[]> {
    const documents = await this.listFiltered(
      accessPredicate(this.deps.permissions, username)
    );

    logEvent("DOCUMENT_LIST", { username, count: documents.length });
    return documents;
  }

  listAll(): Promise<DocumentRecord[]> {
    return this.deps.store.metadata.getAll();
  }

  async deleteDocument(id: string): Promise<void> {
    const removed = await this.coordinator.delete(id);
    if (!removed) {
      throw new DocumentNotFoundError(id);
    }
  }

  countDocuments(): Promise<number> {
    return this.deps.store.index.count();
  }
}
