import fs from "fs";
import path from "path";

import { config } from "@config/index";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LoggerPort {
  log(level: LogLevel, message: string, meta?: Record<string, unknown>): void;
  event?(type: string, payload: Record<string, unknown>): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const logFile = config.observability.logFile
  ? path.resolve(process.cwd(), config.observability.logFile)
  : null;

function ensureLogDir(file: string): void {
  const dir = path.dirname(file);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
}

function isEnabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[config.observability.logLevel];
}

function writeEntry(level: LogLevel, entry: Record<string, unknown>): void {
  if (level === "error") {
    console.error(entry);
  } else if (level === "warn") {
    console.warn(entry);
  } else {
    console.log(entry);
  }

  if (!logFile) {
    return;
  }

  try {
    ensureLogDir(logFile);
    fs.appendFileSync(logFile, JSON.stringify(entry) + "\n", {
      encoding: "utf-8",
    });
  } catch (err) {
    console.error("Failed to write log file:", err);
  }
}

/**
 * Structured JSON logger.
 *
 * - log() records `{ timestamp, level, message, ...meta }`, filtered by LOG_LEVEL.
 * - event() records domain events as `{ timestamp, type, ...payload }` at info level.
 */
export const logger: LoggerPort = {
  log(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
    if (!isEnabled(level)) {
      return;
    }

    writeEntry(level, {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...(meta || {}),
    });
  },

  event(type: string, payload: Record<string, unknown>): void {
    if (!isEnabled("info")) {
      return;
    }

    writeEntry("info", {
      timestamp: new Date().toISOString(),
      type,
      ...payload,
    });
  },
};

export function logEvent(type: string, payload: Record<string, unknown>): void {
  if (typeof logger.event === "function") {
    logger.event(type, payload);
    return;
  }

  logger.log("info", type, payload);
}
