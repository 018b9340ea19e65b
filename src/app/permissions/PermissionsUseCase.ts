import type { PermissionChecker } from "@domain/permissions/ports";

export interface UserPermissions {
  user: string;
  permissions: string[];
}

export async function describeUserPermissions(
  checker: PermissionChecker,
  username: string
): Promise<UserPermissions> {
  return {
    user: username,
    permissions: await checker.getUserPermissions(username),
  };
}
