import { EventEmitter } from "node:events";
import type { SupplyChainGraphStore } from "@supply-rag/shared";
import type { FixtureSet } from "../fixtures/schemas.js";
import type { EmbeddingServiceLike } from "../services/llmTypes.js";
import { logger } from "../utils/logger.js";
import type {
  IngestionPhase,
  IngestionStatusEvent,
  IngestionSummary,
  SkippedEdge
} from "./types.js";

/**
 * Loads a fixture set into the graph. Phases run strictly in order because
 * edges reference nodes written by earlier phases. Any error aborts the run;
 * edges whose endpoints do not exist are skipped without an error.
 */
export class IngestionPipeline {
  private readonly eventEmitter: EventEmitter;

  constructor(
    private readonly store: SupplyChainGraphStore,
    private readonly embeddingService: EmbeddingServiceLike,
    eventEmitter?: EventEmitter
  ) {
    this.eventEmitter = eventEmitter ?? new EventEmitter();
  }

  onStatus(listener: (event: IngestionStatusEvent) => void): void {
    this.eventEmitter.on("status", listener);
  }

  async run(fixtures: FixtureSet): Promise<IngestionSummary> {
    const skippedEdges: SkippedEdge[] = [];

    try {
      this.emitStatus("index", 0, 1);
      await this.store.ensureVectorIndex();

      await this.loadProducts(fixtures);

      this.emitStatus("suppliers", 0, fixtures.suppliers.length);
      await this.store.upsertSuppliers(fixtures.suppliers);

      this.emitStatus("warehouses", 0, fixtures.warehouses.length);
      await this.store.upsertWarehouses(fixtures.warehouses);

      this.emitStatus("routes", 0, fixtures.routes.length);
      for (const route of fixtures.routes) {
        const created = await this.store.mergeRoute(route);
        if (!created) {
          skippedEdges.push({ type: "CONNECTED_TO", from: route.from, to: route.to });
        }
      }

      this.emitStatus("relationships", 0, fixtures.relationships.length);
      for (const relationship of fixtures.relationships) {
        const supplies = await this.store.mergeSupplies(relationship);
        if (!supplies) {
          skippedEdges.push({
            type: "SUPPLIES",
            from: relationship.supplier_id,
            to: relationship.product_id
          });
        }

        const storedAt = await this.store.mergeStoredAt(relationship);
        if (!storedAt) {
          skippedEdges.push({
            type: "STORED_AT",
            from: relationship.product_id,
            to: relationship.warehouse_id
          });
        }
      }

      for (const edge of skippedEdges) {
        logger.debug(edge, "Edge skipped: endpoint not found");
      }

      const stats = await this.store.getStats();
      this.emitStatus("completed", 1, 1);

      return {
        products: fixtures.products.length,
        suppliers: fixtures.suppliers.length,
        warehouses: fixtures.warehouses.length,
        routes: fixtures.routes.length,
        relationships: fixtures.relationships.length,
        skippedEdges,
        stats
      };
    } catch (error) {
      this.emitStatus("error", 0, 0, error instanceof Error ? error.message : "Unknown error");
      throw error;
    }
  }

  private async loadProducts(fixtures: FixtureSet): Promise<void> {
    const total = fixtures.products.length;
    this.emitStatus("products", 0, total);

    let processed = 0;
    for (const product of fixtures.products) {
      const descriptionEmbedding = await this.embeddingService.encode(product.description);
      await this.store.upsertProduct({ ...product, descriptionEmbedding });
      processed += 1;
      this.emitStatus("products", processed, total);
    }
  }

  private emitStatus(
    phase: IngestionPhase,
    processed: number,
    total: number,
    message?: string
  ): void {
    const event: IngestionStatusEvent = { phase, processed, total };
    if (message !== undefined) {
      event.message = message;
    }
    this.eventEmitter.emit("status", event);
  }
}
