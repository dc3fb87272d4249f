import type { ProductContext, SupplyChainGraphStore } from "@supply-rag/shared";
import { logger } from "../utils/logger.js";
import type { EmbeddingServiceLike } from "./llmTypes.js";

export const NO_CONTEXT_SENTINEL = "No relevant context found.";
export const RETRIEVAL_ERROR_SENTINEL = "Error retrieving context.";

type RetrievalStore = Pick<SupplyChainGraphStore, "findTopK" | "getProductContexts">;

export interface RetrievalServiceLike {
  retrieve(question: string): Promise<string>;
}

export function formatProductContext(products: ProductContext[]): string {
  const lines: string[] = [];
  for (const product of products) {
    lines.push(`Product: ${product.name}`);
    lines.push(`Description: ${product.description}`);
    for (const supplier of product.suppliers) {
      lines.push(`Supplied by: ${supplier.name}`);
    }
    for (const warehouse of product.warehouses) {
      lines.push(`Stored at: ${warehouse.name} in ${warehouse.location}`);
    }
    lines.push("---");
  }
  return lines.join("\n");
}

export class RetrievalService implements RetrievalServiceLike {
  constructor(
    private readonly store: RetrievalStore,
    private readonly embeddingService: EmbeddingServiceLike | null,
    private readonly topK = 3
  ) {}

  /**
   * Never throws. Callers treat both sentinels as an empty context.
   */
  async retrieve(question: string): Promise<string> {
    try {
      if (!this.embeddingService) {
        throw new Error("Embedding service is unavailable");
      }

      const embedding = await this.embeddingService.encode(question);
      const ranked = await this.store.findTopK(embedding, this.topK);
      if (ranked.length === 0) {
        return NO_CONTEXT_SENTINEL;
      }

      const contexts = await this.store.getProductContexts(ranked.map((item) => item.id));
      const text = formatProductContext(contexts);
      return text.length > 0 ? text : NO_CONTEXT_SENTINEL;
    } catch (error) {
      logger.error({ err: error }, "Error retrieving context");
      return RETRIEVAL_ERROR_SENTINEL;
    }
  }
}
