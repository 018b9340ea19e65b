import { describe, expect, it } from "vitest";

import { UpsertCoordinator } from "@domain/documents/upsertCoordinator";
import { InMemoryDocumentStore } from "@infrastructure/memory/InMemoryDocumentStore";
import {
  DimensionMismatchError,
  DocumentAlreadyExistsError,
  ValidationError,
} from "@typesLocal/AppError";

function setup() {
  const store = new InMemoryDocumentStore();
  return { store, coordinator: new UpsertCoordinator(store) };
}

describe("UpsertCoordinator", () => {
  it("keeps one document per id, reflecting the latest upsert", async () => {
    const { store, coordinator } = setup();

    await coordinator.upsert({
      id: "d1",
      title: "Draft",
      content: "v1",
      embedding: [1, 0],
    });
    await coordinator.upsert({
      id: "d1",
      title: "Final",
      content: "v2",
      embedding: [0, 1],
    });

    expect(await store.metadata.getAll()).toEqual([
      { id: "d1", title: "Final", content: "v2", metadata: {} },
    ]);
    expect(await store.index.count()).toBe(1);
    expect(await store.index.knn([0, 1], 1)).toEqual([
      { id: "d1", distance: 0 },
    ]);
  });

  it("rejects an embedding of a different length and leaves existing entries intact", async () => {
    const { store, coordinator } = setup();
    await coordinator.upsert({ id: "a", title: "A", content: "a", embedding: [1, 0, 0] });
    await coordinator.upsert({ id: "b", title: "B", content: "b", embedding: [0, 1, 0] });

    await expect(
      coordinator.upsert({
        id: "c",
        title: "C",
        content: "c",
        embedding: [0, 0, 1, 0],
      })
    ).rejects.toBeInstanceOf(DimensionMismatchError);

    const all = await store.metadata.getAll();
    expect(all.map((d) => d.id)).toEqual(["a", "b"]);
    expect(await store.index.count()).toBe(2);
    expect(await store.index.dimensions()).toBe(3);
  });

  it("does not write metadata when a replacement vector is rejected", async () => {
    const { store, coordinator } = setup();
    await coordinator.upsert({ id: "a", title: "A", content: "old", embedding: [1, 0] });

    await expect(
      coordinator.upsert({ id: "a", title: "A", content: "new", embedding: [1, 0, 0] })
    ).rejects.toBeInstanceOf(DimensionMismatchError);

    expect((await store.metadata.get("a"))?.content).toBe("old");
  });

  it("generates an id when none is given", async () => {
    const { store, coordinator } = setup();

    const id = await coordinator.upsert({
      title: "Untitled",
      content: "body",
      embedding: [1, 2],
    });

    expect(id).toMatch(/^[0-9a-f-]{36}$/);
    expect(await store.metadata.get(id)).not.toBeNull();
  });

  it("refuses to add over an existing id", async () => {
    const { store, coordinator } = setup();
    await coordinator.add({ id: "x", title: "X", content: "first", embedding: [1, 0] });

    await expect(
      coordinator.add({ id: "x", title: "X", content: "second", embedding: [0, 1] })
    ).rejects.toBeInstanceOf(DocumentAlreadyExistsError);

    expect((await store.metadata.get("x"))?.content).toBe("first");
  });

  it("validates required fields before touching the store", async () => {
    const { store, coordinator } = setup();

    await expect(
      coordinator.upsert({ id: "x", title: " ", content: "body", embedding: [1] })
    ).rejects.toBeInstanceOf(ValidationError);
    await expect(
      coordinator.upsert({ id: "x", title: "T", content: "body", embedding: [] })
    ).rejects.toBeInstanceOf(ValidationError);
    await expect(
      coordinator.upsert({
        id: "x",
        title: "T",
        content: "body",
        embedding: [1, Number.NaN],
      })
    ).rejects.toBeInstanceOf(ValidationError);

    expect(await store.index.count()).toBe(0);
  });

  it("deletes from both stores", async () => {
    const { store, coordinator } = setup();
    await coordinator.upsert({ id: "a", title: "A", content: "a", embedding: [1, 0] });
    await coordinator.upsert({ id: "b", title: "B", content: "b", embedding: [0, 1] });

    expect(await coordinator.delete("a")).toBe(true);
    expect(await coordinator.delete("a")).toBe(false);

    expect((await store.metadata.getAll()).map((d) => d.id)).toEqual(["b"]);
    expect(await store.index.knn([1, 0], 5)).toEqual([{ id: "b", distance: 1 }]);
  });
});
