/**
 * Centralized configuration for the permission-aware retrieval service.
 *
 * Provides type-safe access to environment variables and application settings:
 * - OpenAI API configuration (answer model, embedding model, timeouts)
 * - Storage driver selection and PostgreSQL connection parameters
 * - Adaptive filtered search tuning (multiplier, growth factor, attempt ceiling)
 * - Permission back end selection (static table or Keto)
 * - Application-level settings (port, error mode, logging)
 *
 * Enum-like settings are validated at load time; a bad value fails startup.
 */
import dotenv from "dotenv";
import { z } from "zod";

dotenv.config();

type Env = Record<string, string | undefined>;

const StoreDriverSchema = z.enum(["postgres", "memory"]);
const DistanceMetricSchema = z.enum(["cosine", "l2"]);
const PermissionsModeSchema = z.enum(["static", "keto"]);
const ErrorModeSchema = z.enum(["detailed", "secure"]);
const LogLevelSchema = z.enum(["debug", "info", "warn", "error"]);

export type StoreDriver = z.infer<typeof StoreDriverSchema>;
export type PermissionsMode = z.infer<typeof PermissionsModeSchema>;
export type ErrorMode = z.infer<typeof ErrorModeSchema>;

function numberFrom(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === "") {
    return fallback;
  }

  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new Error(`Expected a number but received "${value}"`);
  }
  return parsed;
}

function enumFrom<T extends string>(
  schema: z.ZodEnum<[T, ...T[]]>,
  name: string,
  value: string | undefined,
  fallback: T
): T {
  const result = schema.safeParse(value?.trim() || fallback);
  if (!result.success) {
    throw new Error(
      `${name} must be one of ${schema.options.join(", ")} (got "${value}")`
    );
  }
  return result.data;
}

export function loadConfig(env: Env = process.env) {
  return {
    env: env.NODE_ENV || "development",

    openai: {
      key: env.OPENAI_API_KEY ?? "",
      model: env.OPENAI_MODEL || "gpt-4o-mini",
      embeddingModel: env.OPENAI_EMBEDDING_MODEL || "text-embedding-3-small",
      baseUrl: env.OPENAI_BASE_URL || undefined,
      timeoutMs: numberFrom(env.OPENAI_TIMEOUT_MS, 30000),
    },

    store: {
      driver: enumFrom(
        StoreDriverSchema,
        "STORE_DRIVER",
        env.STORE_DRIVER,
        "postgres"
      ),
      distanceMetric: enumFrom(
        DistanceMetricSchema,
        "VECTOR_DISTANCE_METRIC",
        env.VECTOR_DISTANCE_METRIC,
        "cosine"
      ),
    },

    db: {
      host: env.DB_HOST || "localhost",
      port: numberFrom(env.DB_PORT, 5432),
      user: env.DB_USER,
      password: env.DB_PASSWORD,
      database: env.DB_NAME,
      max: numberFrom(env.DB_POOL_MAX, 10),
      idleTimeoutMs: numberFrom(env.DB_IDLE_TIMEOUT_MS, 30000),
      connectionTimeoutMs: numberFrom(env.DB_CONN_TIMEOUT_MS, 10000),
    },

    port: numberFrom(env.PORT, 3000),

    search: {
      initialMultiplier: numberFrom(env.SEARCH_INITIAL_MULTIPLIER, 2),
      growthFactor: numberFrom(env.SEARCH_GROWTH_FACTOR, 2),
      maxAttempts: numberFrom(env.SEARCH_MAX_ATTEMPTS, 10),
    },

    rag: {
      topK: numberFrom(env.RAG_TOP_K, 3),
      maxTopK: numberFrom(env.RAG_MAX_TOP_K, 50),
    },

    permissions: {
      mode: enumFrom(
        PermissionsModeSchema,
        "PERMISSIONS_MODE",
        env.PERMISSIONS_MODE,
        "static"
      ),
      file: env.PERMISSIONS_FILE || "config/permissions.json",
      keto: {
        readUrl: env.KETO_READ_URL || "http://localhost:4466",
        timeoutMs: numberFrom(env.KETO_TIMEOUT_MS, 10000),
      },
    },

    security: {
      errorMode: enumFrom(
        ErrorModeSchema,
        "ERROR_MODE",
        env.ERROR_MODE,
        "detailed"
      ),
    },

    observability: {
      logLevel: enumFrom(LogLevelSchema, "LOG_LEVEL", env.LOG_LEVEL, "info"),
      logFile: env.LOG_FILE ?? "logs/app.log",
    },
  } as const;
}

export type AppConfig = ReturnType<typeof loadConfig>;

export const config: AppConfig = loadConfig();

export function isProduction(cfg: AppConfig = config): boolean {
  return cfg.env === "production";
}
