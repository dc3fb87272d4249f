import express from "express";
import request from "supertest";
import { describe, expect, it } from "vitest";
import { appConfig } from "../../src/config.js";
import { createHealthRouter } from "../../src/routes/health.js";
import { checkLlmConnection, checkNeo4jConnection } from "../../src/runtime/connectivity.js";
import type { LLMServiceLike } from "../../src/services/llmTypes.js";
import { FakeLLMService } from "../helpers/FakeLLMService.js";
import { FakeSupplyChainStore } from "../helpers/FakeSupplyChainStore.js";

describe("health api", () => {
  it("reports ok when the graph store and the model both answer", async () => {
    const store = new FakeSupplyChainStore();
    const app = express();
    app.use(
      "/api/health",
      createHealthRouter({
        checkNeo4j: () => checkNeo4jConnection({ store }),
        checkLlm: () => checkLlmConnection({ llmService: new FakeLLMService() }),
        startTime: Date.now() - 5_000
      })
    );

    const response = await request(app).get("/api/health");
    expect(response.status).toBe(200);
    expect(response.body.status).toBe("ok");
    expect(response.body.checks).toEqual({ neo4j: "ok", llm: "ok" });
    expect(response.body.uptimeSec).toBeGreaterThanOrEqual(5);
    expect(response.body.memoryUsage.rss).toBeGreaterThan(0);
  });

  it("reports degraded when the model probe fails", async () => {
    const failingModel: LLMServiceLike = {
      generateAnswer: async () => "unused",
      probe: async () => {
        throw new Error("401 Unauthorized");
      }
    };
    const app = express();
    app.use(
      "/api/health",
      createHealthRouter({
        checkNeo4j: async () => "not_configured",
        checkLlm: () => checkLlmConnection({ llmService: failingModel })
      })
    );

    const response = await request(app).get("/api/health");
    expect(response.status).toBe(200);
    expect(response.body.status).toBe("degraded");
    expect(response.body.checks).toEqual({
      neo4j: "not_configured",
      llm: "failed"
    });
  });

  it("reports the graph store as failed when it cannot connect", async () => {
    await expect(
      checkNeo4jConnection({
        store: new FakeSupplyChainStore(),
        ensureStoreConnected: async () => {
          throw new Error("ServiceUnavailable");
        }
      })
    ).resolves.toBe("failed");
  });

  it("reports both services as not configured when credentials are blank", async () => {
    const config = { ...appConfig, NEO4J_URI: "", NEO4J_USERNAME: "", NEO4J_PASSWORD: "", GEMINI_API_KEY: "" };
    const app = express();
    app.use(
      "/api/health",
      createHealthRouter({
        checkNeo4j: () => checkNeo4jConnection({ config }),
        checkLlm: () => checkLlmConnection({ config })
      })
    );

    const response = await request(app).get("/api/health");
    expect(response.status).toBe(200);
    expect(response.body.status).toBe("ok");
    expect(response.body.checks).toEqual({ neo4j: "not_configured", llm: "not_configured" });
  });
});
