/**
 * Mock identity: `Authorization: Bearer <username>`.
 *
 * The bearer value is taken as the user name as-is. There is no token
 * verification; this stands in for a real identity provider.
 */
import { AuthenticationError } from "@typesLocal/AppError";
import type { NextFunction, Request, Response } from "express";

const USER_LOCAL = "user";

export function parseBearerUser(header: string | undefined): string {
  if (!header) {
    throw new AuthenticationError("Missing authorization header");
  }

  const parts = header.split(" ");
  if (parts.length !== 2 || parts[0] !== "Bearer") {
    throw new AuthenticationError("Invalid authorization header format");
  }

  const username = parts[1]?.trim();
  if (!username) {
    throw new AuthenticationError("Invalid username");
  }
  return username;
}

export function requireUser(
  req: Request,
  res: Response,
  next: NextFunction
): void {
  try {
    res.locals[USER_LOCAL] = parseBearerUser(req.header("authorization"));
    next();
  } catch (err: unknown) {
    next(err);
  }
}

export function getAuthenticatedUser(res: Response): string {
  const user: unknown = res.locals[USER_LOCAL];
  if (typeof user !== "string" || user === "") {
    throw new AuthenticationError("Request is not authenticated");
  }
  return user;
}
