import { getServices } from "@app/container";
import { describeUserPermissions } from "@app/permissions/PermissionsUseCase";
import { getAuthenticatedUser } from "@middleware/auth";
import type { Request, Response } from "express";

export async function permissionsController(
  _req: Request,
  res: Response
): Promise<void> {
  const user = getAuthenticatedUser(res);
  res.json(await describeUserPermissions(getServices().permissions, user));
}
