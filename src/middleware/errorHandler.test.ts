import { describe, expect, it, vi } from "vitest";

import { loadConfig } from "@config/index";
import { createErrorHandler } from "@middleware/errorHandler";
import { mockRequest, mockResponse } from "@testing/http";
import {
  AuthorizationCheckError,
  DimensionMismatchError,
} from "@typesLocal/AppError";

function handle(err: unknown, env: Record<string, string> = {}) {
  const { res, status, json } = mockResponse();
  createErrorHandler(loadConfig(env))(err, mockRequest(), res, vi.fn());
  return { status, body: json.mock.calls[0]?.[0] };
}

describe("errorHandler", () => {
  it("maps application errors to their status and details", () => {
    const { status, body } = handle(new DimensionMismatchError(3, 4));

    expect(status).toHaveBeenCalledWith(400);
    expect(body).toEqual({
      error: {
        message:
          "Embedding dimension mismatch: store holds 3-dimensional vectors, got 4",
        code: "ValidationError",
        details: { expected: 3, actual: 4 },
      },
    });
  });

  it("treats unknown errors as 500 infrastructure failures", () => {
    const { status, body } = handle(new Error("socket hang up"));

    expect(status).toHaveBeenCalledWith(500);
    expect(body).toEqual({
      error: { message: "socket hang up", code: "InfrastructureError", details: {} },
    });
  });

  it("keeps the status of framework errors such as malformed JSON", () => {
    const parseError = Object.assign(new Error("Unexpected token"), { status: 400 });

    const { status } = handle(parseError);

    expect(status).toHaveBeenCalledWith(400);
  });

  it("hides server error details in secure mode", () => {
    const { status, body } = handle(
      new AuthorizationCheckError("Permission check failed for acme-corp:2023", {
        status: 503,
      }),
      { ERROR_MODE: "secure" }
    );

    expect(status).toHaveBeenCalledWith(502);
    expect(body).toEqual({
      error: {
        message: "Internal Server Error",
        code: "InfrastructureError",
        details: {},
      },
    });
  });

  it("still explains client errors in secure mode", () => {
    const { body } = handle(new DimensionMismatchError(3, 4), {
      ERROR_MODE: "secure",
    });

    expect(body).toHaveProperty("error.details", { expected: 3, actual: 4 });
  });
});
