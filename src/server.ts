/**
 * Application entry point for the permission-aware retrieval service.
 *
 * Validates OpenAI configuration, prepares the pgvector schema when the
 * Postgres store is selected, then starts the HTTP server.
 */
import { createApp } from "@interfaces/http/createApp";
import { getServices } from "@app/container";
import { config } from "@config/index";
import { pool } from "@infrastructure/database/db";
import { ensureSchema } from "@infrastructure/database/schema";
import { validateOpenAIKey } from "@infrastructure/llm/OpenAIAdapter";
import { logger } from "@infrastructure/logging/Logger";

async function main(): Promise<void> {
  await validateOpenAIKey();

  if (config.store.driver === "postgres") {
    await ensureSchema(pool);
  }

  const services = getServices();
  const server = createApp().listen(config.port, () => {
    logger.log("info", "Server running", {
      url: `http://localhost:${config.port}`,
      store: config.store.driver,
      permissions: config.permissions.mode,
      model: config.openai.model,
    });
  });

  const shutdown = (signal: string) => {
    logger.log("info", "Shutting down", { signal });
    server.close(() => {
      services.store.close().then(
        () => process.exit(0),
        (err: unknown) => {
          logger.log("error", "Store close failed", {
            message: err instanceof Error ? err.message : String(err),
          });
          process.exit(1);
        }
      );
    });
  };

  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((err: unknown) => {
  logger.log("error", "Startup failed", {
    message: err instanceof Error ? err.message : String(err),
  });
  process.exit(1);
});
