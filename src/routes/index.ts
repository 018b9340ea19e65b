/**
 * Express route registration.
 *
 * - /api/health: liveness plus document count
 * - /api/documents: ingestion, permission-filtered listing, deletion
 * - /api/query: permission-aware retrieval-augmented answers
 * - /api/permissions: the caller's grants
 */
import documentsRouter from "@routes/public/documents";
import healthRouter from "@routes/public/health";
import permissionsRouter from "@routes/public/permissions";
import queryRouter from "@routes/public/query";
import type { Express } from "express";

export function registerRoutes(app: Express): void {
  app.use("/api/health", healthRouter);
  app.use("/api/documents", documentsRouter);
  app.use("/api/query", queryRouter);
  app.use("/api/permissions", permissionsRouter);
}
