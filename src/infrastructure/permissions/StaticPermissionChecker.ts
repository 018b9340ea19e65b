/**
 * Table-driven permission checker.
 *
 * The table maps a user name to the taxpayers whose documents they may read.
 * `*` grants every document. User names and taxpayers compare
 * case-insensitively.
 */
import fs from "fs";
import path from "path";
import { z } from "zod";

import type { DocumentRecord } from "@domain/documents/document";
import type { PermissionChecker } from "@domain/permissions/ports";
import { logger } from "@infrastructure/logging/Logger";
import { InfrastructureError } from "@typesLocal/AppError";

export const WILDCARD_PERMISSION = "*";

const PermissionTableSchema = z.record(z.string(), z.array(z.string().min(1)));

export type PermissionTable = z.infer<typeof PermissionTableSchema>;

export function parsePermissionTable(raw: unknown): PermissionTable {
  const result = PermissionTableSchema.safeParse(raw);
  if (!result.success) {
    throw new InfrastructureError("Invalid permission table", 500, {
      issues: result.error.issues.map((issue) => ({
        path: issue.path.join("."),
        message: issue.message,
      })),
    });
  }
  return result.data;
}

export function loadPermissionTable(file: string): PermissionTable {
  const resolved = path.resolve(file);

  let raw: string;
  try {
    raw = fs.readFileSync(resolved, "utf8");
  } catch (error: unknown) {
    throw new InfrastructureError(
      `Cannot read permission table at ${resolved}`,
      500,
      undefined,
      { cause: error }
    );
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error: unknown) {
    throw new InfrastructureError(
      `Permission table at ${resolved} is not valid JSON`,
      500,
      undefined,
      { cause: error }
    );
  }

  const table = parsePermissionTable(parsed);
  logger.log("info", "Permission table loaded", {
    file: resolved,
    users: Object.keys(table).length,
  });
  return table;
}

export class StaticPermissionChecker implements PermissionChecker {
  private readonly grants = new Map<string, string[]>();

  constructor(table: PermissionTable = {}) {
    for (const [user, permissions] of Object.entries(table)) {
      this.grant(user, ...permissions);
    }
  }

  grant(username: string, ...permissions: string[]): void {
    const key = username.toLowerCase();
    const existing = this.grants.get(key) ?? [];
    this.grants.set(key, [...existing, ...permissions]);
  }

  canAccessDocument(username: string, document: DocumentRecord): boolean {
    const permissions = this.grants.get(username.toLowerCase());
    if (!permissions) {
      return false;
    }

    const taxpayer = document.metadata["taxpayer"];

    return permissions.some(
      (permission) =>
        permission === WILDCARD_PERMISSION ||
        (typeof taxpayer === "string" &&
          taxpayer.toLowerCase() === permission.toLowerCase())
    );
  }

  getUserPermissions(username: string): string[] {
    return [...(this.grants.get(username.toLowerCase()) ?? [])];
  }
}
