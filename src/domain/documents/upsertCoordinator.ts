/**
 * Keeps the metadata store and the similarity index in agreement.
 *
 * Every write runs in one DocumentStore transaction covering the metadata row
 * and its vector, so a failure on either side leaves both untouched.
 */
import {
  normalizeDocument,
  toRecord,
  type DocumentInput,
} from "@domain/documents/document";
import type {
  DocumentStore,
  StoreTransaction,
} from "@domain/documents/ports";
import { logEvent } from "@infrastructure/logging/Logger";

export class UpsertCoordinator {
  constructor(private readonly store: DocumentStore) {}

  /** Insert-or-replace keyed by id. Returns the (possibly generated) id. */
  async upsert(input: DocumentInput): Promise<string> {
    const document = normalizeDocument(input);

    await this.run("DOCUMENT_UPSERT", document.id, async (tx) => {
      await tx.metadata.upsert(toRecord(document));
      await tx.index.replace(document.id, document.embedding);
    });

    return document.id;
  }

  /** Insert only; fails with DocumentAlreadyExistsError when the id is taken. */
  async add(input: DocumentInput): Promise<string> {
    const document = normalizeDocument(input);

    await this.run("DOCUMENT_ADD", document.id, async (tx) => {
      await tx.metadata.put(toRecord(document));
      await tx.index.insert(document.id, document.embedding);
    });

    return document.id;
  }

  /** Removes the document from both stores. Resolves false when it did not exist. */
  async delete(id: string): Promise<boolean> {
    let removed = false;

    await this.run("DOCUMENT_DELETE", id, async (tx) => {
      removed = await tx.metadata.remove(id);
      await tx.index.remove(id);
    });

    return removed;
  }

  private async run(
    operation: string,
    id: string,
    work: (tx: StoreTransaction) => Promise<void>
  ): Promise<void> {
    const startedAt = Date.now();

    try {
      await this.store.transaction(work);

      logEvent(`${operation}_SUCCESS`, {
        documentId: id,
        durationMs: Date.now() - startedAt,
      });
    } catch (error: unknown) {
      const caught =
        error instanceof Error
          ? { message: error.message, name: error.name }
          : { message: String(error), name: undefined };

      logEvent(`${operation}_FAILURE`, {
        documentId: id,
        durationMs: Date.now() - startedAt,
        message: caught.message,
        name: caught.name,
      });

      throw error;
    }
  }
}
