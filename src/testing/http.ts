import type { Request, Response } from "express";
import { vi } from "vitest";

interface RequestInit {
  body?: unknown;
  params?: Record<string, string>;
  headers?: Record<string, string>;
  method?: string;
  path?: string;
}

export function mockRequest(init: RequestInit = {}): Request {
  const headers = Object.fromEntries(
    Object.entries(init.headers ?? {}).map(([k, v]) => [k.toLowerCase(), v])
  );

  const req = {
    body: init.body,
    params: init.params ?? {},
    headers,
    method: init.method ?? "GET",
    path: init.path ?? "/",
    header: (name: string) => headers[name.toLowerCase()],
  };
  return req as unknown as Request;
}

export function mockResponse(locals: Record<string, unknown> = {}) {
  const mock = { locals, status: vi.fn(), json: vi.fn() };
  mock.status.mockReturnValue(mock);
  mock.json.mockReturnValue(mock);

  return { ...mock, res: mock as unknown as Response };
}
