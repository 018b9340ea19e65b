import { describe, expect, it, vi } from "vitest";

import {
  getAuthenticatedUser,
  parseBearerUser,
  requireUser,
} from "@middleware/auth";
import { mockRequest, mockResponse } from "@testing/http";
import { AuthenticationError } from "@typesLocal/AppError";

describe("bearer authentication", () => {
  it("stores the bearer user name for the handlers", () => {
    const { res, locals } = mockResponse();
    const next = vi.fn();

    requireUser(mockRequest({ headers: { Authorization: "Bearer alice" } }), res, next);

    expect(next).toHaveBeenCalledWith();
    expect(locals["user"]).toBe("alice");
    expect(getAuthenticatedUser(res)).toBe("alice");
  });

  it.each([
    [undefined, "Missing authorization header"],
    ["Basic YWxpY2U=", "Invalid authorization header format"],
    ["Bearer", "Invalid authorization header format"],
    ["Bearer alice extra", "Invalid authorization header format"],
  ])("rejects %s", (header, message) => {
    expect(() => parseBearerUser(header)).toThrow(message);
  });

  it("passes a 401 to the error handler", () => {
    const { res } = mockResponse();
    const next = vi.fn();

    requireUser(mockRequest(), res, next);

    const error: unknown = next.mock.calls[0]?.[0];
    expect(error).toBeInstanceOf(AuthenticationError);
    expect(error).toMatchObject({ statusCode: 401 });
  });
});
