import { describe, expect, it } from "vitest";

import { seedTaxDocuments, testServices } from "@testing/services";
import { DocumentNotFoundError } from "@typesLocal/AppError";

describe("DocumentUseCase", () => {
  it("embeds the content and stores the document", async () => {
    const { services, embedder, store } = testServices();

    const { id } = await services.documents.addDocument({
      id: "r1",
      title: "Refund",
      content: "Refund for 2023",
      metadata: { taxpayer: "Acme Corp" },
    });

    expect(id).toBe("r1");
    expect(embedder.embed).toHaveBeenCalledWith("Refund for 2023");
    expect(await store.metadata.get("r1")).toEqual({
      id: "r1",
      title: "Refund",
      content: "Refund for 2023",
      metadata: { taxpayer: "Acme Corp" },
    });
    expect(await store.index.knn([1, 0], 1)).toEqual([{ id: "r1", distance: 0 }]);
  });

  it("replaces a document re-added under the same id", async () => {
    const { services } = testServices();

    await services.documents.addDocument({ id: "d1", title: "T", content: "v1" });
    await services.documents.addDocument({ id: "d1", title: "T", content: "v2" });

    const all = await services.documents.listAll();
    expect(all).toHaveLength(1);
    expect(all[0]?.content).toBe("v2");
  });

  it("lists only the documents the user may read", async () => {
    const { services } = testServices();
    await seedTaxDocuments(services);

    const forAlice = await services.documents.listDocuments("alice");
    const forAdmin = await services.documents.listDocuments("admin");
    const forStranger = await services.documents.listDocuments("mallory");

    expect(forAlice.map((d) => d.id)).toEqual(["a", "c"]);
    expect(forAdmin.map((d) => d.id)).toEqual(["a", "b", "c"]);
    expect(forStranger).toEqual([]);
  });

  it("lists by an arbitrary predicate in id order", async () => {
    const { services } = testServices();
    await seedTaxDocuments(services);

    const from2023 = await services.documents.listFiltered(
      (doc) => doc.metadata["year"] === 2023
    );

    expect(from2023.map((d) => d.id)).toEqual(["a", "b"]);
  });

  it("deletes documents and reports unknown ids", async () => {
    const { services } = testServices();
    await seedTaxDocuments(services);

    await services.documents.deleteDocument("b");

    expect(await services.documents.countDocuments()).toBe(2);
    await expect(services.documents.deleteDocument("b")).rejects.toBeInstanceOf(
      DocumentNotFoundError
    );
  });
});
