import type { ServiceConnectionStatus, SupplyChainGraphStore } from "@supply-rag/shared";
import { appConfig, type AppConfig } from "../config.js";
import type { LLMServiceLike } from "../services/llmTypes.js";
import { logger } from "../utils/logger.js";
import {
  ensureGraphStoreConnected,
  getGraphStoreSingleton,
  getLLMServiceSingleton
} from "./graphRuntime.js";

export function isNeo4jConfigured(config: AppConfig = appConfig): boolean {
  return (
    config.NEO4J_URI.trim().length > 0 &&
    config.NEO4J_USERNAME.trim().length > 0 &&
    config.NEO4J_PASSWORD.trim().length > 0
  );
}

export function isLlmConfigured(config: AppConfig = appConfig): boolean {
  return config.GEMINI_API_KEY.trim().length > 0;
}

interface Neo4jConnectionOptions {
  config?: AppConfig;
  store?: SupplyChainGraphStore;
  ensureStoreConnected?: () => Promise<void>;
}

interface LlmConnectionOptions {
  config?: AppConfig;
  llmService?: LLMServiceLike;
}

export async function checkNeo4jConnection(
  options: Neo4jConnectionOptions = {}
): Promise<ServiceConnectionStatus> {
  if (!options.store && !isNeo4jConfigured(options.config)) {
    return "not_configured";
  }

  try {
    const store = options.store ?? getGraphStoreSingleton();
    const ensureStoreConnected =
      options.ensureStoreConnected ??
      (options.store ? () => store.connect() : () => ensureGraphStoreConnected(store));

    await ensureStoreConnected();
    const healthy = await store.healthCheck();
    return healthy ? "ok" : "failed";
  } catch (error) {
    logger.warn({ err: error }, "Neo4j connection check failed");
    return "failed";
  }
}

export async function checkLlmConnection(
  options: LlmConnectionOptions = {}
): Promise<ServiceConnectionStatus> {
  if (!options.llmService && !isLlmConfigured(options.config)) {
    return "not_configured";
  }

  try {
    const llmService = options.llmService ?? getLLMServiceSingleton();
    await llmService.probe();
    return "ok";
  } catch (error) {
    logger.warn({ err: error }, "LLM connection check failed");
    return "failed";
  }
}
