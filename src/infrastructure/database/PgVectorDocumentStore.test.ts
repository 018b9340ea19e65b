import { describe, expect, it, vi } from "vitest";

import { UpsertCoordinator } from "@domain/documents/upsertCoordinator";
import { PgVectorDocumentStore } from "@infrastructure/database/PgVectorDocumentStore";
import { SCHEMA_STATEMENTS, ensureSchema } from "@infrastructure/database/schema";
import {
  DimensionMismatchError,
  DocumentAlreadyExistsError,
} from "@typesLocal/AppError";

import type { Pool } from "pg";

interface FakeResult {
  rows: unknown[];
  rowCount: number;
}

type Responder = (sql: string, params: unknown[] | undefined) => Partial<FakeResult>;

const squash = (sql: string): string => sql.replace(/\s+/g, " ").trim();

/** Scripted stand-in for a pg Pool: every statement is recorded and answered by `respond`. */
function fakePool(respond: Responder = () => ({})) {
  const statements: Array<{ sql: string; params: unknown[] | undefined }> = [];

  const query = vi.fn(async (sql: string, params?: unknown[]) => {
    const text = squash(sql);
    statements.push({ sql: text, params });
    const result = respond(text, params);
    return { rows: result.rows ?? [], rowCount: result.rowCount ?? 1 };
  });

  const client = { query, release: vi.fn() };
  const pool = {
    query,
    connect: vi.fn(async () => client),
    end: vi.fn(async () => undefined),
  };

  return {
    pool: pool as unknown as Pool,
    client,
    statements,
    sql: () => statements.map((s) => s.sql),
  };
}

const settingsRow = (dimensions: number): Responder => (sql) =>
  sql.startsWith("SELECT dimensions FROM vector_index_settings")
    ? { rows: [{ dimensions }] }
    : {};

describe("PgVectorDocumentStore", () => {
  it("writes metadata and vector in one committed transaction", async () => {
    const fake = fakePool(settingsRow(2));
    const coordinator = new UpsertCoordinator(new PgVectorDocumentStore(fake.pool));

    await coordinator.upsert({
      id: "d1",
      title: "Return 2023",
      content: "text",
      metadata: { taxpayer: "Acme Corp" },
      embedding: [0.5, 0.25],
    });

    const sql = fake.sql();
    expect(sql[0]).toBe("BEGIN");
    expect(sql[1]).toMatch(/^INSERT INTO documents .* ON CONFLICT \(id\) DO UPDATE SET/);
    expect(sql[2]).toMatch(/^INSERT INTO vector_index_settings/);
    expect(sql[3]).toBe(
      "SELECT dimensions FROM vector_index_settings WHERE singleton FOR SHARE;"
    );
    expect(sql[4]).toBe("DELETE FROM document_embeddings WHERE id = $1;");
    expect(sql[5]).toMatch(/^INSERT INTO document_embeddings/);
    expect(sql[6]).toBe("COMMIT");
    expect(sql).toHaveLength(7);

    expect(fake.statements[1]?.params).toEqual([
      "d1",
      "Return 2023",
      "text",
      JSON.stringify({ taxpayer: "Acme Corp" }),
    ]);
    expect(fake.statements[5]?.params).toEqual(["d1", "[0.5,0.25]"]);
    expect(fake.client.release).toHaveBeenCalledWith(undefined);
  });

  it("rolls back when the vector length differs from the established one", async () => {
    const fake = fakePool(settingsRow(3));
    const coordinator = new UpsertCoordinator(new PgVectorDocumentStore(fake.pool));

    await expect(
      coordinator.upsert({ id: "d1", title: "T", content: "c", embedding: [1, 0] })
    ).rejects.toBeInstanceOf(DimensionMismatchError);

    const sql = fake.sql();
    expect(sql).toContain("ROLLBACK");
    expect(sql).not.toContain("COMMIT");
    expect(sql.some((s) => s.startsWith("INSERT INTO document_embeddings"))).toBe(false);
    expect(fake.client.release).toHaveBeenCalledTimes(1);
  });

  it("reports a taken id on add", async () => {
    const fake = fakePool((sql) =>
      sql.startsWith("INSERT INTO documents") ? { rowCount: 0 } : {}
    );
    const coordinator = new UpsertCoordinator(new PgVectorDocumentStore(fake.pool));

    await expect(
      coordinator.add({ id: "d1", title: "T", content: "c", embedding: [1, 0] })
    ).rejects.toBeInstanceOf(DocumentAlreadyExistsError);
    expect(fake.sql().at(-1)).toBe("ROLLBACK");
  });

  it("rethrows the original error and discards the client when rollback fails", async () => {
    const rollbackFailure = new Error("connection lost");
    const fake = fakePool((sql) => {
      if (sql === "ROLLBACK") {
        throw rollbackFailure;
      }
      return {};
    });
    const store = new PgVectorDocumentStore(fake.pool);
    const original = new Error("work failed");

    await expect(
      store.transaction(async () => {
        throw original;
      })
    ).rejects.toBe(original);
    expect(fake.client.release).toHaveBeenCalledWith(rollbackFailure);
  });

  it("reports whether delete removed a row", async () => {
    const fake = fakePool((sql) =>
      sql.startsWith("DELETE FROM documents") ? { rowCount: 0 } : {}
    );
    const coordinator = new UpsertCoordinator(new PgVectorDocumentStore(fake.pool));

    expect(await coordinator.delete("missing")).toBe(false);
    expect(fake.sql()).toEqual([
      "BEGIN",
      "DELETE FROM documents WHERE id = $1;",
      "DELETE FROM document_embeddings WHERE id = $1;",
      "COMMIT",
    ]);
  });

  it("queries nearest neighbours with the cosine operator and a stable tie order", async () => {
    const fake = fakePool((sql) => {
      if (sql.startsWith("SELECT dimensions")) {
        return { rows: [{ dimensions: 2 }] };
      }
      if (sql.startsWith("SELECT id, embedding")) {
        return {
          rows: [
            { id: "a", distance: "0.1" },
            { id: "b", distance: 0.3 },
          ],
        };
      }
      return {};
    });
    const store = new PgVectorDocumentStore(fake.pool);

    const candidates = await store.index.knn([1, 0], 4);

    expect(candidates).toEqual([
      { id: "a", distance: 0.1 },
      { id: "b", distance: 0.3 },
    ]);
    const knnStatement = fake.statements.at(-1);
    expect(knnStatement?.sql).toBe(
      "SELECT id, embedding <=> $1::vector AS distance FROM document_embeddings ORDER BY distance ASC, id ASC LIMIT $2;"
    );
    expect(knnStatement?.params).toEqual(["[1,0]", 4]);
  });

  it("reads search candidates and their records in one joined statement", async () => {
    const fake = fakePool((sql) => {
      if (sql.startsWith("SELECT dimensions")) {
        return { rows: [{ dimensions: 2 }] };
      }
      if (sql.startsWith("SELECT d.id")) {
        return {
          rows: [
            {
              id: "a",
              title: "A",
              content: "x",
              metadata: { taxpayer: "Acme" },
              distance: "0.25",
            },
            { id: "b", title: "B", content: "y", metadata: null, distance: 0.5 },
          ],
        };
      }
      return {};
    });
    const store = new PgVectorDocumentStore(fake.pool);

    const documents = await store.snapshot.nearest([1, 0], 4);

    expect(documents).toEqual([
      { id: "a", title: "A", content: "x", metadata: { taxpayer: "Acme" }, distance: 0.25 },
      { id: "b", title: "B", content: "y", metadata: {}, distance: 0.5 },
    ]);
    const joined = fake.statements.at(-1);
    expect(joined?.sql).toBe(
      "SELECT d.id, d.title, d.content, d.metadata, e.embedding <=> $1::vector AS distance FROM document_embeddings e JOIN documents d ON d.id = e.id ORDER BY distance ASC, d.id ASC LIMIT $2;"
    );
    expect(joined?.params).toEqual(["[1,0]", 4]);
    expect(fake.statements).toHaveLength(2);
  });

  it("uses the Euclidean operator when configured", async () => {
    const fake = fakePool(settingsRow(2));
    const store = new PgVectorDocumentStore(fake.pool, { distanceMetric: "l2" });

    await store.index.knn([1, 0], 2);

    expect(fake.sql().at(-1)).toContain("embedding <-> $1::vector");
  });

  it("skips the KNN query before any vector exists and rejects wrong query lengths", async () => {
    const empty = fakePool();
    expect(await new PgVectorDocumentStore(empty.pool).index.knn([1, 0], 3)).toEqual([]);
    expect(empty.sql()).toEqual([
      "SELECT dimensions FROM vector_index_settings WHERE singleton;",
    ]);

    const established = fakePool(settingsRow(3));
    await expect(
      new PgVectorDocumentStore(established.pool).index.knn([1, 0], 3)
    ).rejects.toBeInstanceOf(DimensionMismatchError);
  });

  it("maps metadata rows and skips the query for an empty id list", async () => {
    const fake = fakePool((sql) =>
      sql.includes("WHERE id = ANY")
        ? {
            rows: [
              { id: "a", title: "A", content: "x", metadata: { taxpayer: "Acme" } },
              { id: "b", title: "B", content: "y", metadata: null },
            ],
          }
        : {}
    );
    const store = new PgVectorDocumentStore(fake.pool);

    expect((await store.metadata.getMany([])).size).toBe(0);
    expect(fake.statements).toHaveLength(0);

    const found = await store.metadata.getMany(["a", "b"]);
    expect(found.get("a")).toEqual({
      id: "a",
      title: "A",
      content: "x",
      metadata: { taxpayer: "Acme" },
    });
    expect(found.get("b")?.metadata).toEqual({});
    expect(fake.statements[0]?.params).toEqual([["a", "b"]]);
  });

  it("closes the pool", async () => {
    const fake = fakePool();
    await new PgVectorDocumentStore(fake.pool).close();
    expect(fake.pool.end).toHaveBeenCalledTimes(1);
  });
});

describe("ensureSchema", () => {
  it("runs every DDL statement in order", async () => {
    const fake = fakePool();

    await ensureSchema(fake.pool);

    expect(fake.statements.map((s) => s.sql)).toEqual(
      SCHEMA_STATEMENTS.map(squash)
    );
    expect(fake.sql()[0]).toBe("CREATE EXTENSION IF NOT EXISTS vector;");
  });
});
