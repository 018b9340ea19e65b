import { getServices } from "@app/container";
import { config } from "@config/index";
import { logger } from "@infrastructure/logging/Logger";
import type { Request, Response } from "express";

/** Reports the store as reachable along with its document count. */
export async function healthController(
  _req: Request,
  res: Response
): Promise<void> {
  try {
    const documents = await getServices().documents.countDocuments();
    res.json({ status: "ok", documents });
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    logger.log("error", "Health check failed", { message });

    res.status(503).json(
      config.security.errorMode === "secure"
        ? { status: "error" }
        : { status: "error", detail: message }
    );
  }
}
