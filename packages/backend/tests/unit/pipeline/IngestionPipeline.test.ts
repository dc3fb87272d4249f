import { describe, expect, it } from "vitest";
import type { FixtureSet } from "../../../src/fixtures/schemas.js";
import { IngestionPipeline } from "../../../src/pipeline/IngestionPipeline.js";
import type { IngestionStatusEvent } from "../../../src/pipeline/types.js";
import { FakeEmbeddingService } from "../../helpers/FakeEmbeddingService.js";
import { FakeSupplyChainStore } from "../../helpers/FakeSupplyChainStore.js";

function fixtures(): FixtureSet {
  return {
    products: [
      { id: "p1", name: "Laptop", description: "A portable computer", price: 999, category: "Computers" },
      { id: "p2", name: "Phone", description: "A pocket phone", price: 599, category: "Phones" }
    ],
    suppliers: [{ id: "s1", name: "Acme Parts", location: "Shenzhen", specialization: "Electronics" }],
    warehouses: [
      { id: "w1", name: "Central Hub", location: "Berlin", capacity: 50000 },
      { id: "w2", name: "North Depot", location: "Hamburg", capacity: 20000 }
    ],
    routes: [{ from: "w1", to: "w2", distance: 290, duration: 3.5 }],
    relationships: [
      { supplier_id: "s1", product_id: "p1", warehouse_id: "w1" },
      { supplier_id: "s1", product_id: "p2", warehouse_id: "w2" }
    ]
  };
}

function createPipeline(store: FakeSupplyChainStore): { pipeline: IngestionPipeline; embeddings: FakeEmbeddingService } {
  const embeddings = new FakeEmbeddingService(
    {
      "A portable computer": [1, 0, 0],
      "A pocket phone": [0, 1, 0]
    },
    [0, 0, 1]
  );
  return { pipeline: new IngestionPipeline(store, embeddings), embeddings };
}

describe("IngestionPipeline", () => {
  it("writes nodes with description embeddings and all edges", async () => {
    const store = new FakeSupplyChainStore();
    const { pipeline, embeddings } = createPipeline(store);

    const summary = await pipeline.run(fixtures());

    expect(embeddings.encodedTexts).toEqual(["A portable computer", "A pocket phone"]);
    expect(store.products.get("p1")?.descriptionEmbedding).toEqual([1, 0, 0]);
    expect(store.getEdge("CONNECTED_TO", "w1", "w2")?.properties).toEqual({ distance: 290, duration: 3.5 });
    expect(store.vectorIndexCalls).toBe(1);
    expect(summary).toEqual({
      products: 2,
      suppliers: 1,
      warehouses: 2,
      routes: 1,
      relationships: 2,
      skippedEdges: [],
      stats: {
        nodeCounts: { Product: 2, Supplier: 1, Warehouse: 2 },
        edgeCounts: { SUPPLIES: 2, STORED_AT: 2, CONNECTED_TO: 1 }
      }
    });
  });

  it("produces the same graph when run twice", async () => {
    const store = new FakeSupplyChainStore();
    const { pipeline } = createPipeline(store);

    const first = await pipeline.run(fixtures());
    const second = await pipeline.run(fixtures());

    expect(second.stats).toEqual(first.stats);
    expect(store.edges.size).toBe(5);
  });

  it("overwrites node properties on reload", async () => {
    const store = new FakeSupplyChainStore();
    const { pipeline } = createPipeline(store);
    await pipeline.run(fixtures());

    const updated = fixtures();
    updated.warehouses = [{ id: "w1", name: "Central Hub", location: "Berlin", capacity: 65000 }];
    await pipeline.run(updated);

    expect(store.warehouses.get("w1")?.capacity).toBe(65000);
    expect(store.warehouses.size).toBe(2);
  });

  it("skips edges whose endpoints do not exist", async () => {
    const store = new FakeSupplyChainStore();
    const { pipeline } = createPipeline(store);
    const input = fixtures();
    input.routes.push({ from: "w1", to: "w9", distance: 10, duration: 1 });
    input.relationships.push({ supplier_id: "s1", product_id: "p99", warehouse_id: "w1" });

    const summary = await pipeline.run(input);

    expect(summary.skippedEdges).toEqual([
      { type: "CONNECTED_TO", from: "w1", to: "w9" },
      { type: "SUPPLIES", from: "s1", to: "p99" },
      { type: "STORED_AT", from: "p99", to: "w1" }
    ]);
    expect(summary.stats.edgeCounts).toEqual({ SUPPLIES: 2, STORED_AT: 2, CONNECTED_TO: 1 });
    expect(store.products.has("p99")).toBe(false);
  });

  it("emits phases in load order", async () => {
    const store = new FakeSupplyChainStore();
    const { pipeline } = createPipeline(store);
    const events: IngestionStatusEvent[] = [];
    pipeline.onStatus((event) => events.push(event));

    await pipeline.run(fixtures());

    const phases = events.map((event) => event.phase).filter((phase, index, all) => all[index - 1] !== phase);
    expect(phases).toEqual(["index", "products", "suppliers", "warehouses", "routes", "relationships", "completed"]);
    expect(events.filter((event) => event.phase === "products")).toEqual([
      { phase: "products", processed: 0, total: 2 },
      { phase: "products", processed: 1, total: 2 },
      { phase: "products", processed: 2, total: 2 }
    ]);
  });

  it("aborts and reports an error event when a write fails", async () => {
    const store = new FakeSupplyChainStore();
    store.failWith = new Error("Neo4j query failed: constraint");
    const { pipeline } = createPipeline(store);
    const events: IngestionStatusEvent[] = [];
    pipeline.onStatus((event) => events.push(event));

    await expect(pipeline.run(fixtures())).rejects.toThrow("Neo4j query failed: constraint");
    expect(events).toEqual([
      { phase: "index", processed: 0, total: 1 },
      { phase: "error", processed: 0, total: 0, message: "Neo4j query failed: constraint" }
    ]);
    expect(store.products.size).toBe(0);
  });

  it("aborts when a description cannot be embedded", async () => {
    const store = new FakeSupplyChainStore();
    const { pipeline, embeddings } = createPipeline(store);
    embeddings.failWith = new Error("Embedding has 2 dimensions, expected 3");

    await expect(pipeline.run(fixtures())).rejects.toThrow("Embedding has 2 dimensions, expected 3");
    expect(store.suppliers.size).toBe(0);
  });
});
