/**
 * Postgres + pgvector implementation of the DocumentStore port.
 *
 * - KNN: exact scan ordered by `embedding <=> $1::vector` (cosine) or
 *   `<->` (Euclidean), then by id, so ties rank identically on every call.
 *   The search read joins `documents` in the same statement, so distances and
 *   content come from one snapshot.
 * - Writes: one pooled client per transaction (BEGIN / COMMIT / ROLLBACK).
 *   The ON CONFLICT row lock on `documents` serializes writers to the same id;
 *   the settings row serializes racing first inserts that fix the dimension.
 * - pgvector has no in-place vector update; replace is delete + insert.
 */
import {
  assertValidEmbedding,
  type DocumentRecord,
  type ScoredDocument,
} from "@domain/documents/document";
import {
  filterRecords,
  type Candidate,
  type DocumentMetadataStore,
  type DocumentMetadataWriter,
  type DocumentPredicate,
  type DocumentStore,
  type SimilarityIndex,
  type SimilarityIndexWriter,
  type SnapshotReader,
  type StoreTransaction,
} from "@domain/documents/ports";
import { logger } from "@infrastructure/logging/Logger";
import {
  DimensionMismatchError,
  DocumentAlreadyExistsError,
} from "@typesLocal/AppError";
import {
  pgDistanceOperator,
  toPgVectorLiteral,
  type DistanceMetric,
} from "@utils/vector";

import type { Pool, PoolClient } from "pg";

interface DocumentRow {
  id: string;
  title: string;
  content: string;
  metadata: Record<string, unknown> | null;
}

interface CandidateRow {
  id: string;
  distance: number | string;
}

interface ScoredDocumentRow extends DocumentRow {
  distance: number | string;
}

export interface PgVectorStoreOptions {
  distanceMetric?: DistanceMetric;
}

function toDocumentRecord(row: DocumentRow): DocumentRecord {
  return {
    id: row.id,
    title: row.title,
    content: row.content,
    metadata: row.metadata ?? {},
  };
}

export class PgSimilarityIndex implements SimilarityIndex, SnapshotReader {
  private readonly operator: "<=>" | "<->";

  constructor(
    private readonly pool: Pool,
    metric: DistanceMetric = "cosine"
  ) {
    this.operator = pgDistanceOperator(metric);
  }

  async count(): Promise<number> {
    const result = await this.pool.query<{ count: number }>(
      `SELECT COUNT(*)::int AS count FROM document_embeddings;`
    );
    return result.rows[0]?.count ?? 0;
  }

  async dimensions(): Promise<number | null> {
    const result = await this.pool.query<{ dimensions: number }>(
      `SELECT dimensions FROM vector_index_settings WHERE singleton;`
    );
    return result.rows[0]?.dimensions ?? null;
  }

  async knn(query: readonly number[], k: number): Promise<Candidate[]> {
    if (!(await this.acceptsQuery(query, k))) {
      return [];
    }

    const result = await this.pool.query<CandidateRow>(
      `
      SELECT
        id,
        embedding ${this.operator} $1::vector AS distance
      FROM document_embeddings
      ORDER BY distance ASC, id ASC
      LIMIT $2;
      `,
      [toPgVectorLiteral(query), Math.floor(k)]
    );

    return result.rows.map((row) => ({
      id: row.id,
      distance: Number(row.distance),
    }));
  }

  /** Single-statement KNN joined with metadata rows. */
  async nearest(query: readonly number[], k: number): Promise<ScoredDocument[]> {
    if (!(await this.acceptsQuery(query, k))) {
      return [];
    }

    const result = await this.pool.query<ScoredDocumentRow>(
      `
      SELECT
        d.id,
        d.title,
        d.content,
        d.metadata,
        e.embedding ${this.operator} $1::vector AS distance
      FROM document_embeddings e
      JOIN documents d ON d.id = e.id
      ORDER BY distance ASC, d.id ASC
      LIMIT $2;
      `,
      [toPgVectorLiteral(query), Math.floor(k)]
    );

    return result.rows.map((row) => ({
      ...toDocumentRecord(row),
      distance: Number(row.distance),
    }));
  }

  /** False when there is nothing to query; throws on a wrong-length query. */
  private async acceptsQuery(query: readonly number[], k: number): Promise<boolean> {
    if (k <= 0) {
      return false;
    }

    assertValidEmbedding(query);

    const established = await this.dimensions();
    if (established === null) {
      return false;
    }
    if (query.length !== established) {
      throw new DimensionMismatchError(established, query.length);
    }
    return true;
  }
}

export class PgMetadataStore implements DocumentMetadataStore {
  constructor(private readonly pool: Pool) {}

  async get(id: string): Promise<DocumentRecord | null> {
    const result = await this.pool.query<DocumentRow>(
      `SELECT id, title, content, metadata FROM documents WHERE id = $1;`,
      [id]
    );
    const row = result.rows[0];
    return row ? toDocumentRecord(row) : null;
  }

  async getMany(ids: readonly string[]): Promise<Map<string, DocumentRecord>> {
    const found = new Map<string, DocumentRecord>();
    if (ids.length === 0) {
      return found;
    }

    const result = await this.pool.query<DocumentRow>(
      `SELECT id, title, content, metadata FROM documents WHERE id = ANY($1::text[]);`,
      [[...ids]]
    );

    for (const row of result.rows) {
      found.set(row.id, toDocumentRecord(row));
    }
    return found;
  }

  async getAll(): Promise<DocumentRecord[]> {
    const result = await this.pool.query<DocumentRow>(
      `SELECT id, title, content, metadata FROM documents ORDER BY id ASC;`
    );
    return result.rows.map(toDocumentRecord);
  }

  async getFiltered(predicate: DocumentPredicate): Promise<DocumentRecord[]> {
    return filterRecords(await this.getAll(), predicate);
  }
}

export class PgStoreTransaction implements StoreTransaction {
  readonly index: SimilarityIndexWriter;
  readonly metadata: DocumentMetadataWriter;

  private establishedDimensions: number | null = null;

  constructor(private readonly client: PoolClient) {
    this.metadata = {
      put: (record) => this.putMetadata(record),
      upsert: (record) => this.upsertMetadata(record),
      remove: (id) => this.deleteById("documents", id),
    };

    this.index = {
      insert: (id, embedding) => this.insertVector(id, embedding),
      replace: async (id, embedding) => {
        await this.ensureDimensions(embedding);
        await this.deleteById("document_embeddings", id);
        await this.insertVector(id, embedding);
      },
      remove: (id) => this.deleteById("document_embeddings", id),
    };
  }

  private async putMetadata(record: DocumentRecord): Promise<void> {
    const result = await this.client.query(
      `
      INSERT INTO documents (id, title, content, metadata)
      VALUES ($1, $2, $3, $4::jsonb)
      ON CONFLICT (id) DO NOTHING
      RETURNING id;
      `,
      [record.id, record.title, record.content, JSON.stringify(record.metadata)]
    );

    if ((result.rowCount ?? 0) === 0) {
      throw new DocumentAlreadyExistsError(record.id);
    }
  }

  private async upsertMetadata(record: DocumentRecord): Promise<void> {
    await this.client.query(
      `
      INSERT INTO documents (id, title, content, metadata)
      VALUES ($1, $2, $3, $4::jsonb)
      ON CONFLICT (id)
      DO UPDATE SET
        title = EXCLUDED.title,
        content = EXCLUDED.content,
        metadata = EXCLUDED.metadata,
        updated_at = NOW();
      `,
      [record.id, record.title, record.content, JSON.stringify(record.metadata)]
    );
  }

  private async insertVector(
    id: string,
    embedding: readonly number[]
  ): Promise<void> {
    await this.ensureDimensions(embedding);

    const result = await this.client.query(
      `
      INSERT INTO document_embeddings (id, embedding)
      VALUES ($1, $2::vector)
      ON CONFLICT (id) DO NOTHING
      RETURNING id;
      `,
      [id, toPgVectorLiteral(embedding)]
    );

    if ((result.rowCount ?? 0) === 0) {
      throw new DocumentAlreadyExistsError(id);
    }
  }

  private async deleteById(
    table: "documents" | "document_embeddings",
    id: string
  ): Promise<boolean> {
    const result = await this.client.query(
      `DELETE FROM ${table} WHERE id = $1;`,
      [id]
    );
    return (result.rowCount ?? 0) > 0;
  }

  /**
   * Fixes the store's dimensionality on first use and rejects any other
   * length afterwards. A concurrent first insert blocks on the settings row
   * until the other transaction finishes.
   */
  private async ensureDimensions(embedding: readonly number[]): Promise<void> {
    assertValidEmbedding(embedding);

    if (this.establishedDimensions === null) {
      await this.client.query(
        `
        INSERT INTO vector_index_settings (singleton, dimensions)
        VALUES (TRUE, $1)
        ON CONFLICT (singleton) DO NOTHING;
        `,
        [embedding.length]
      );

      const result = await this.client.query<{ dimensions: number }>(
        `SELECT dimensions FROM vector_index_settings WHERE singleton FOR SHARE;`
      );
      this.establishedDimensions = result.rows[0]?.dimensions ?? embedding.length;
    }

    if (embedding.length !== this.establishedDimensions) {
      throw new DimensionMismatchError(
        this.establishedDimensions,
        embedding.length
      );
    }
  }
}

export class PgVectorDocumentStore implements DocumentStore {
  readonly index: PgSimilarityIndex;
  readonly metadata: PgMetadataStore;
  readonly snapshot: SnapshotReader;

  constructor(
    private readonly pool: Pool,
    options: PgVectorStoreOptions = {}
  ) {
    this.index = new PgSimilarityIndex(pool, options.distanceMetric);
    this.metadata = new PgMetadataStore(pool);
    this.snapshot = this.index;
  }

  async transaction<T>(work: (tx: StoreTransaction) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();
    let releaseError: Error | undefined;

    try {
      await client.query("BEGIN");
      const result = await work(new PgStoreTransaction(client));
      await client.query("COMMIT");
      return result;
    } catch (error: unknown) {
      try {
        await client.query("ROLLBACK");
      } catch (rollbackError: unknown) {
        releaseError =
          rollbackError instanceof Error
            ? rollbackError
            : new Error(String(rollbackError));

        logger.log("error", "Transaction rollback failed", {
          message: releaseError.message,
          originalError: error instanceof Error ? error.message : String(error),
        });
      }
      throw error;
    } finally {
      client.release(releaseError);
    }
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
