import express from "express";
import request from "supertest";
import { describe, expect, it } from "vitest";
import { createGraphRouter } from "../../src/routes/graph.js";
import { FakeSupplyChainStore } from "../helpers/FakeSupplyChainStore.js";

describe("graph api", () => {
  it("returns node and edge counts", async () => {
    const store = new FakeSupplyChainStore();
    await store.upsertWarehouses([
      { id: "w1", name: "Central Hub", location: "Berlin", capacity: 50000 },
      { id: "w2", name: "North Depot", location: "Hamburg", capacity: 20000 }
    ]);
    await store.mergeRoute({ from: "w1", to: "w2", distance: 290, duration: 3.5 });

    const app = express();
    app.use("/api/graph", createGraphRouter({ store }));

    const response = await request(app).get("/api/graph/overview");
    expect(response.status).toBe(200);
    expect(response.body).toEqual({
      stats: {
        nodeCounts: { Product: 0, Supplier: 0, Warehouse: 2 },
        edgeCounts: { SUPPLIES: 0, STORED_AT: 0, CONNECTED_TO: 1 }
      }
    });
    expect(store.connected).toBe(true);
  });

  it("returns 503 when the store cannot connect", async () => {
    const app = express();
    app.use(
      "/api/graph",
      createGraphRouter({
        store: new FakeSupplyChainStore(),
        ensureStoreConnected: async () => {
          throw new Error("ServiceUnavailable");
        }
      })
    );

    const response = await request(app).get("/api/graph/overview");
    expect(response.status).toBe(503);
    expect(response.body).toEqual({ error: "Graph store unavailable" });
  });

  it("returns 500 when the stats query fails", async () => {
    const store = new FakeSupplyChainStore();
    store.failWith = new Error("Neo4j query failed");
    const app = express();
    app.use("/api/graph", createGraphRouter({ store }));

    const response = await request(app).get("/api/graph/overview");
    expect(response.status).toBe(500);
    expect(response.body).toEqual({ error: "Failed to load graph overview" });
  });
});
