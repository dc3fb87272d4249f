import type { SupplyChainGraphStore } from "@supply-rag/shared";
import { appConfig } from "../config.js";
import { ChatService } from "../services/ChatService.js";
import { EmbeddingService } from "../services/EmbeddingService.js";
import { InMemoryChatStore } from "../services/InMemoryChatStore.js";
import type { EmbeddingServiceLike, LLMServiceLike } from "../services/llmTypes.js";
import { LLMService } from "../services/LLMService.js";
import { RetrievalService } from "../services/RetrievalService.js";
import { Neo4jSupplyChainStore } from "../store/Neo4jSupplyChainStore.js";
import { logger } from "../utils/logger.js";

let graphStoreSingleton: SupplyChainGraphStore | null = null;
let embeddingServiceSingleton: EmbeddingServiceLike | null | undefined;
let llmServiceSingleton: LLMServiceLike | null = null;
let chatServiceSingleton: ChatService | null = null;
let connectPromise: Promise<void> | null = null;

export function getGraphStoreSingleton(): SupplyChainGraphStore {
  if (!graphStoreSingleton) {
    graphStoreSingleton = Neo4jSupplyChainStore.fromEnv();
  }

  return graphStoreSingleton;
}

/**
 * Built once per process. A construction failure is logged and remembered as
 * `null` so the chat path can answer with its error sentinel instead of
 * crashing.
 */
export function getEmbeddingServiceOrNull(): EmbeddingServiceLike | null {
  if (embeddingServiceSingleton !== undefined) {
    return embeddingServiceSingleton;
  }

  try {
    embeddingServiceSingleton = EmbeddingService.fromEnv();
  } catch (error) {
    logger.error({ err: error }, "Embedding service unavailable");
    embeddingServiceSingleton = null;
  }

  return embeddingServiceSingleton;
}

export function getLLMServiceSingleton(): LLMServiceLike {
  if (!llmServiceSingleton) {
    llmServiceSingleton = LLMService.fromEnv();
  }

  return llmServiceSingleton;
}

export function getChatServiceSingleton(): ChatService {
  if (!chatServiceSingleton) {
    chatServiceSingleton = new ChatService(
      new InMemoryChatStore(),
      new RetrievalService(
        getGraphStoreSingleton(),
        getEmbeddingServiceOrNull(),
        appConfig.RETRIEVAL_TOP_K
      ),
      getLLMServiceSingleton()
    );
  }

  return chatServiceSingleton;
}

export async function ensureGraphStoreConnected(
  store: SupplyChainGraphStore = getGraphStoreSingleton()
): Promise<void> {
  if (connectPromise) {
    return connectPromise;
  }

  connectPromise = store.connect().catch((error: unknown) => {
    connectPromise = null;
    throw error;
  });

  return connectPromise;
}
