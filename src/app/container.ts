/**
 * Composition root.
 *
 * Picks the document store (pgvector or in-memory), the permission back end
 * (static table or Keto) and wires them into the use cases. Controllers reach
 * the result through getServices(); tests install their own with setServices().
 */
import { DocumentUseCase } from "@app/documents/DocumentUseCase";
import { QueryUseCase } from "@app/query/QueryUseCase";
import { config, type AppConfig } from "@config/index";
import type { DocumentStore } from "@domain/documents/ports";
import type { AnswerGeneratorPort, EmbeddingPort } from "@domain/llm/ports";
import type { PermissionChecker } from "@domain/permissions/ports";
import { FilteredSearchEngine } from "@domain/retrieval/filteredSearch";
import { pool } from "@infrastructure/database/db";
import { PgVectorDocumentStore } from "@infrastructure/database/PgVectorDocumentStore";
import { openAIEmbeddingProvider } from "@infrastructure/llm/EmbeddingProvider";
import { answerGenerator } from "@infrastructure/llm/OpenAIAdapter";
import { InMemoryDocumentStore } from "@infrastructure/memory/InMemoryDocumentStore";
import { KetoPermissionChecker } from "@infrastructure/permissions/KetoPermissionChecker";
import {
  StaticPermissionChecker,
  loadPermissionTable,
} from "@infrastructure/permissions/StaticPermissionChecker";

export interface AppServices {
  store: DocumentStore;
  permissions: PermissionChecker;
  documents: DocumentUseCase;
  query: QueryUseCase;
}

export interface ServiceOverrides {
  store?: DocumentStore;
  permissions?: PermissionChecker;
  embedder?: EmbeddingPort;
  answers?: AnswerGeneratorPort;
}

function createStore(cfg: AppConfig): DocumentStore {
  if (cfg.store.driver === "memory") {
    return new InMemoryDocumentStore({
      distanceMetric: cfg.store.distanceMetric,
    });
  }
  return new PgVectorDocumentStore(pool, {
    distanceMetric: cfg.store.distanceMetric,
  });
}

function createPermissionChecker(cfg: AppConfig): PermissionChecker {
  if (cfg.permissions.mode === "keto") {
    return new KetoPermissionChecker({
      readUrl: cfg.permissions.keto.readUrl,
      timeoutMs: cfg.permissions.keto.timeoutMs,
    });
  }
  return new StaticPermissionChecker(loadPermissionTable(cfg.permissions.file));
}

export function createServices(
  cfg: AppConfig = config,
  overrides: ServiceOverrides = {}
): AppServices {
  const store = overrides.store ?? createStore(cfg);
  const permissions = overrides.permissions ?? createPermissionChecker(cfg);
  const embedder = overrides.embedder ?? openAIEmbeddingProvider;
  const answers = overrides.answers ?? answerGenerator;

  const engine = new FilteredSearchEngine(store.snapshot, {
    initialMultiplier: cfg.search.initialMultiplier,
    growthFactor: cfg.search.growthFactor,
    maxAttempts: cfg.search.maxAttempts,
  });

  return {
    store,
    permissions,
    documents: new DocumentUseCase({ store, embedder, permissions }),
    query: new QueryUseCase({
      engine,
      embedder,
      answers,
      permissions,
      defaultTopK: cfg.rag.topK,
      maxTopK: cfg.rag.maxTopK,
    }),
  };
}

let current: AppServices | null = null;

export function getServices(): AppServices {
  if (!current) {
    current = createServices();
  }
  return current;
}

export function setServices(services: AppServices | null): void {
  current = services;
}
