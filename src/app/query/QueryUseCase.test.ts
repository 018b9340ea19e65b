import { describe, expect, it } from "vitest";

import type { PermissionChecker } from "@domain/permissions/ports";
import { seedTaxDocuments, testServices } from "@testing/services";
import { AuthorizationCheckError, ValidationError } from "@typesLocal/AppError";

describe("QueryUseCase", () => {
  it("answers from the authorized documents only", async () => {
    const { services, embedder, answers } = testServices();
    await seedTaxDocuments(services);

    const result = await services.query.query("alice", {
      question: "  When is my refund?  ",
    });

    expect(embedder.embed).toHaveBeenLastCalledWith("When is my refund?");
    expect(result.sources.map((d) => [d.id, d.distance])).toEqual([
      ["a", 0],
      ["c", 1],
    ]);
    expect(result.meta).toEqual({
      requestedK: 3,
      attempts: 1,
      candidatesFetched: 3,
      predicateCalls: 3,
      outcome: "exhausted",
    });
    expect(answers.generate).toHaveBeenCalledWith(
      "When is my refund?",
      result.sources
    );
    expect(result.answer).toBe("answered from 2 documents");
  });

  it("passes an empty context when the user may see nothing", async () => {
    const { services, answers } = testServices();
    await seedTaxDocuments(services);

    const result = await services.query.query("mallory", { question: "refund?" });

    expect(result.sources).toEqual([]);
    expect(answers.generate).toHaveBeenCalledWith("refund?", []);
  });

  it("honours topK", async () => {
    const { services } = testServices();
    await seedTaxDocuments(services);

    const result = await services.query.query("admin", {
      question: "refund",
      topK: 1,
    });

    expect(result.sources.map((d) => d.id)).toEqual(["a"]);
    expect(result.meta.outcome).toBe("satisfied");
  });

  it("defaults and caps topK", () => {
    const { services } = testServices();

    expect(services.query.resolveTopK(undefined)).toBe(3);
    expect(services.query.resolveTopK(500)).toBe(50);
    expect(() => services.query.resolveTopK(0)).toThrow(ValidationError);
    expect(() => services.query.resolveTopK(2.5)).toThrow(ValidationError);
  });

  it("rejects a blank question", async () => {
    const { services, embedder } = testServices();

    await expect(
      services.query.query("alice", { question: "   " })
    ).rejects.toBeInstanceOf(ValidationError);
    expect(embedder.embed).not.toHaveBeenCalled();
  });

  it("fails instead of answering when a permission check fails", async () => {
    const failure = new AuthorizationCheckError("keto unavailable");
    const unavailable: PermissionChecker = {
      canAccessDocument: () => Promise.reject(failure),
      getUserPermissions: () => [],
    };
    const { services, answers } = testServices(unavailable);
    await seedTaxDocuments(services);

    await expect(
      services.query.query("alice", { question: "refund?" })
    ).rejects.toBe(failure);
    expect(answers.generate).not.toHaveBeenCalled();
  });
});
