import type { DocumentRecord } from "@domain/documents/document";
import type { DocumentPredicate } from "@domain/documents/ports";

/**
 * Access decisions for documents.
 *
 * Implementations either answer or throw; a failed check must never be
 * reported as `false`.
 */
export interface PermissionChecker {
  canAccessDocument(
    username: string,
    document: DocumentRecord
  ): boolean | Promise<boolean>;

  /** Grants held by the user, as shown by GET /api/permissions. */
  getUserPermissions(username: string): string[] | Promise<string[]>;
}

/** Binds a checker to one user, giving the predicate a filtered search or listing expects. */
export function accessPredicate(
  checker: PermissionChecker,
  username: string
): DocumentPredicate {
  return (document) => checker.canAccessDocument(username, document);
}
