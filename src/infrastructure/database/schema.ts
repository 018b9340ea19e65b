import { logEvent } from "@infrastructure/logging/Logger";

import type { Pool } from "pg";

/**
 * Idempotent DDL for the pgvector document store.
 *
 * - documents: metadata rows (no vectors).
 * - document_embeddings: one vector per document, removed with its row.
 * - vector_index_settings: single row holding the dimensionality fixed by the
 *   first accepted document.
 */
export const SCHEMA_STATEMENTS: readonly string[] = [
  `CREATE EXTENSION IF NOT EXISTS vector;`,
  `
  CREATE TABLE IF NOT EXISTS documents (
    id TEXT PRIMARY KEY,
    title TEXT NOT NULL,
    content TEXT NOT NULL,
    metadata JSONB NOT NULL DEFAULT '{}'::jsonb,
    created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
    updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
  );
  `,
  `
  CREATE TABLE IF NOT EXISTS document_embeddings (
    id TEXT PRIMARY KEY REFERENCES documents(id) ON DELETE CASCADE,
    embedding vector NOT NULL
  );
  `,
  `
  CREATE TABLE IF NOT EXISTS vector_index_settings (
    singleton BOOLEAN PRIMARY KEY DEFAULT TRUE CHECK (singleton),
    dimensions INTEGER NOT NULL CHECK (dimensions > 0)
  );
  `,
];

export async function ensureSchema(pool: Pool): Promise<void> {
  for (const statement of SCHEMA_STATEMENTS) {
    await pool.query(statement);
  }

  logEvent("DB_SCHEMA_READY", { statements: SCHEMA_STATEMENTS.length });
}
