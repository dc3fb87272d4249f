import { resolveDataDir } from "../config.js";
import { loadFixtureSet } from "../fixtures/fixtureLoader.js";
import { parseFixtureSet } from "../fixtures/schemas.js";
import { IngestionPipeline } from "../pipeline/IngestionPipeline.js";
import { EmbeddingService } from "../services/EmbeddingService.js";
import { Neo4jSupplyChainStore } from "../store/Neo4jSupplyChainStore.js";
import { logger } from "../utils/logger.js";

async function main(): Promise<void> {
  const dataDir = resolveDataDir();
  const fixtures = parseFixtureSet(await loadFixtureSet(dataDir));
  const embeddingService = EmbeddingService.fromEnv();
  const store = Neo4jSupplyChainStore.fromEnv();

  const pipeline = new IngestionPipeline(store, embeddingService);
  pipeline.onStatus((event) => {
    if (event.phase === "products" && event.processed > 0) {
      logger.debug(event, "Product loaded");
      return;
    }
    logger.info(event, `Ingestion phase: ${event.phase}`);
  });

  try {
    await store.connect();
    const summary = await pipeline.run(fixtures);
    logger.info(
      {
        dataDir,
        products: summary.products,
        suppliers: summary.suppliers,
        warehouses: summary.warehouses,
        routes: summary.routes,
        relationships: summary.relationships,
        skippedEdges: summary.skippedEdges.length,
        stats: summary.stats
      },
      "Data loading completed"
    );
    if (summary.skippedEdges.length > 0) {
      logger.warn(
        { skippedEdges: summary.skippedEdges },
        "Some relationships reference ids that do not exist and were not created"
      );
    }
  } finally {
    await store.disconnect();
  }
}

main().catch((error: unknown) => {
  logger.fatal({ err: error }, "Data loading failed");
  process.exitCode = 1;
});
