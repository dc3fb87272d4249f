import { Router } from "express";
import type { GraphOverviewResponse, SupplyChainGraphStore } from "@supply-rag/shared";
import { ensureGraphStoreConnected, getGraphStoreSingleton } from "../runtime/graphRuntime.js";
import { logger } from "../utils/logger.js";

interface CreateGraphRouterOptions {
  store?: SupplyChainGraphStore;
  ensureStoreConnected?: () => Promise<void>;
}

export function createGraphRouter(options: CreateGraphRouterOptions = {}): Router {
  const getStore = (): SupplyChainGraphStore => options.store ?? getGraphStoreSingleton();
  const ensureStoreConnected =
    options.ensureStoreConnected ??
    (options.store ? () => getStore().connect() : () => ensureGraphStoreConnected());

  const graphRouter = Router();

  graphRouter.get("/overview", async (_req, res) => {
    try {
      await ensureStoreConnected();
    } catch (error) {
      logger.error({ err: error }, "Graph store connection failed");
      return res.status(503).json({ error: "Graph store unavailable" });
    }

    try {
      const response: GraphOverviewResponse = { stats: await getStore().getStats() };
      return res.json(response);
    } catch (error) {
      logger.error({ err: error }, "Failed to load graph overview");
      return res.status(500).json({ error: "Failed to load graph overview" });
    }
  });

  return graphRouter;
}
