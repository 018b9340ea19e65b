/**
 * Express application factory, kept apart from the listener so tests can
 * mount it without opening a port.
 */
import express, { type Express } from "express";

import { errorHandler } from "@middleware/errorHandler";
import { registerRoutes } from "@routes/index";

export function createApp(): Express {
  const app = express();
  app.use(express.json({ limit: "2mb" }));

  registerRoutes(app);

  app.use(errorHandler);
  return app;
}
