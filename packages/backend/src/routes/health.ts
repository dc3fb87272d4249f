import { Router } from "express";
import type { HealthResponse, ServiceConnectionStatus } from "@supply-rag/shared";
import { checkLlmConnection, checkNeo4jConnection } from "../runtime/connectivity.js";

interface CreateHealthRouterOptions {
  checkNeo4j?: () => Promise<ServiceConnectionStatus>;
  checkLlm?: () => Promise<ServiceConnectionStatus>;
  startTime?: number;
}

export function createHealthRouter(options: CreateHealthRouterOptions = {}): Router {
  const checkNeo4j = options.checkNeo4j ?? (() => checkNeo4jConnection());
  const checkLlm = options.checkLlm ?? (() => checkLlmConnection());
  const startTime = options.startTime ?? Date.now();

  const healthRouter = Router();

  healthRouter.get("/", async (_req, res) => {
    const [neo4j, llm] = await Promise.all([checkNeo4j(), checkLlm()]);
    const status: HealthResponse["status"] =
      neo4j === "failed" || llm === "failed" ? "degraded" : "ok";

    const mem = process.memoryUsage();
    const response: HealthResponse = {
      status,
      timestamp: new Date().toISOString(),
      uptimeSec: Math.max(0, Math.floor((Date.now() - startTime) / 1000)),
      checks: {
        neo4j,
        llm
      },
      memoryUsage: {
        rss: mem.rss,
        heapUsed: mem.heapUsed,
        heapTotal: mem.heapTotal
      }
    };
    res.json(response);
  });

  return healthRouter;
}
