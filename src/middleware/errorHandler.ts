/**
 * Global error handling middleware.
 *
 * Maps AppErrors to `{ error: { message, code, details } }` with their status;
 * anything else becomes a 500 InfrastructureError. In secure mode (or in
 * production) 5xx responses carry a generic message and no details.
 */
import { config, isProduction, type AppConfig } from "@config/index";
import { logger } from "@infrastructure/logging/Logger";
import {
  InfrastructureError,
  isAppError,
  type AppError,
} from "@typesLocal/AppError";
import type { NextFunction, Request, Response } from "express";

const GENERIC_MESSAGE = "Internal Server Error";

function readStatus(err: unknown): number | undefined {
  if (err && typeof err === "object") {
    const status: unknown = Reflect.get(err, "statusCode") ?? Reflect.get(err, "status");
    if (typeof status === "number" && status >= 400 && status < 600) {
      return status;
    }
  }
  return undefined;
}

function toAppError(err: unknown): AppError {
  if (isAppError(err)) {
    return err;
  }

  const message = err instanceof Error && err.message ? err.message : GENERIC_MESSAGE;
  return new InfrastructureError(message, readStatus(err) ?? 500, undefined, {
    cause: err,
  });
}

export function createErrorHandler(cfg: AppConfig = config) {
  const hideServerErrors =
    cfg.security.errorMode === "secure" || isProduction(cfg);

  return function errorHandler(
    err: unknown,
    req: Request,
    res: Response,
    _next: NextFunction
  ): void {
    const appError = toAppError(err);
    const status = appError.statusCode ?? 500;

    logger.log(status >= 500 ? "error" : "warn", "Request failed", {
      method: req.method,
      path: req.path,
      type: appError.type,
      statusCode: status,
      message: appError.message,
      metadata: appError.metadata ? JSON.stringify(appError.metadata) : undefined,
      originalError: appError === err ? undefined : String(err),
    });

    if (hideServerErrors && status >= 500) {
      res.status(status).json({
        error: { message: GENERIC_MESSAGE, code: appError.type, details: {} },
      });
      return;
    }

    res.status(status).json({
      error: {
        message: appError.message,
        code: appError.type,
        details: appError.metadata ?? {},
      },
    });
  };
}

export const errorHandler = createErrorHandler();
