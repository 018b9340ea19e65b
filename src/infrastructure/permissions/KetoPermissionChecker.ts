/**
 * Permission checker backed by an Ory Keto read API.
 *
 * Documents map to `<kebab-taxpayer>:<year>` objects in the `documents`
 * namespace; access means the user holds the `viewer` relation on that object.
 * Transport failures and unexpected responses throw AuthorizationCheckError.
 */
import axios, { type AxiosInstance } from "axios";
import { z } from "zod";

import type { DocumentRecord } from "@domain/documents/document";
import type { PermissionChecker } from "@domain/permissions/ports";
import { logger } from "@infrastructure/logging/Logger";
import { AuthorizationCheckError } from "@typesLocal/AppError";

export const KETO_NAMESPACE = "documents";
export const KETO_VIEWER_RELATION = "viewer";

const CheckResponseSchema = z.object({ allowed: z.boolean() });

const RelationTuplesResponseSchema = z.object({
  relation_tuples: z
    .array(z.object({ object: z.string() }).passthrough())
    .default([]),
});

export interface KetoPermissionCheckerOptions {
  readUrl: string;
  timeoutMs?: number;
  http?: Pick<AxiosInstance, "get">;
}

/**
 * `{ taxpayer: "Acme Corp", year: 2023 }` -> `acme-corp:2023`; null without a
 * taxpayer. Only a numeric year counts; anything else maps to `unknown`.
 */
export function documentToKetoObject(document: DocumentRecord): string | null {
  const taxpayer = document.metadata["taxpayer"];
  if (typeof taxpayer !== "string" || taxpayer.trim() === "") {
    return null;
  }

  const rawYear = document.metadata["year"];
  let year = "unknown";
  if (typeof rawYear === "number" && Number.isFinite(rawYear)) {
    year = String(Math.round(rawYear));
  }

  return `${taxpayer.toLowerCase().replace(/ /g, "-")}:${year}`;
}

function describeFailure(error: unknown): Record<string, unknown> {
  if (axios.isAxiosError(error)) {
    return {
      message: error.message,
      code: error.code,
      status: error.response?.status,
    };
  }
  return { message: error instanceof Error ? error.message : String(error) };
}

export class KetoPermissionChecker implements PermissionChecker {
  private readonly http: Pick<AxiosInstance, "get">;

  constructor(options: KetoPermissionCheckerOptions) {
    this.http =
      options.http ??
      axios.create({
        baseURL: options.readUrl,
        timeout: options.timeoutMs ?? 10000,
      });
  }

  async canAccessDocument(
    username: string,
    document: DocumentRecord
  ): Promise<boolean> {
    const object = documentToKetoObject(document);
    if (!object) {
      logger.log("warn", "Document has no taxpayer; denying access", {
        documentId: document.id,
      });
      return false;
    }

    let body: unknown;
    try {
      const response = await this.http.get("/relation-tuples/check/openapi", {
        params: {
          namespace: KETO_NAMESPACE,
          object,
          relation: KETO_VIEWER_RELATION,
          subject_id: username,
        },
      });
      body = response.data;
    } catch (error: unknown) {
      const failure = describeFailure(error);
      logger.log("error", "KETO_CHECK_FAILURE", {
        username,
        object,
        ...failure,
      });
      throw new AuthorizationCheckError(
        `Permission check failed for ${object}`,
        failure,
        { cause: error }
      );
    }

    const parsed = CheckResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new AuthorizationCheckError(
        `Permission check for ${object} returned an unexpected response`
      );
    }
    return parsed.data.allowed;
  }

  async getUserPermissions(username: string): Promise<string[]> {
    let body: unknown;
    try {
      const response = await this.http.get("/relation-tuples", {
        params: { namespace: KETO_NAMESPACE, subject_id: username },
      });
      body = response.data;
    } catch (error: unknown) {
      const failure = describeFailure(error);
      logger.log("error", "KETO_LIST_FAILURE", { username, ...failure });
      throw new AuthorizationCheckError(
        "Listing permissions failed",
        failure,
        { cause: error }
      );
    }

    const parsed = RelationTuplesResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new AuthorizationCheckError(
        "Listing permissions returned an unexpected response"
      );
    }
    return parsed.data.relation_tuples.map((tuple) => tuple.object);
  }
}
