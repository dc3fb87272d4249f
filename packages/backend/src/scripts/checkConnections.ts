import { checkLlmConnection, checkNeo4jConnection, isNeo4jConfigured } from "../runtime/connectivity.js";
import { getGraphStoreSingleton } from "../runtime/graphRuntime.js";
import { logger } from "../utils/logger.js";

async function main(): Promise<void> {
  try {
    const [neo4j, llm] = await Promise.all([checkNeo4jConnection(), checkLlmConnection()]);
    logger.info({ neo4j, llm }, "Connection check finished");
    if (neo4j !== "ok" || llm !== "ok") {
      process.exitCode = 1;
    }
  } finally {
    if (isNeo4jConfigured()) {
      await getGraphStoreSingleton().disconnect();
    }
  }
}

main().catch((error: unknown) => {
  logger.fatal({ err: error }, "Connection check failed");
  process.exitCode = 1;
});
