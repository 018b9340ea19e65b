/**
 * PostgreSQL connection pool shared by the pgvector document store.
 *
 * The pool connects lazily, so importing this module never opens a socket.
 */
import { config } from "@config/index";
import { logger } from "@infrastructure/logging/Logger";
import { Pool } from "pg";

export const pool = new Pool({
  host: config.db.host,
  port: config.db.port,
  user: config.db.user,
  password: config.db.password,
  database: config.db.database,
  max: config.db.max,
  idleTimeoutMillis: config.db.idleTimeoutMs,
  connectionTimeoutMillis: config.db.connectionTimeoutMs,
});

pool.on("error", (err) => {
  logger.log("error", "Unexpected PG pool error", {
    message: err.message,
    name: err.name,
  });
});
