import { createApp } from "./app.js";
import { appConfig, missingRequiredSettings } from "./config.js";
import { getGraphStoreSingleton } from "./runtime/graphRuntime.js";
import { logger } from "./utils/logger.js";

const missing = missingRequiredSettings();
if (missing.length > 0) {
  logger.warn({ missing }, "Starting without credentials; /api/health reports them as not_configured");
}

const server = createApp().listen(appConfig.PORT, () => {
  logger.info(`Supply chain assistant API is running on http://localhost:${appConfig.PORT}`);
});

function shutdown(signal: string): void {
  logger.info({ signal }, "Shutting down");
  server.close(() => {
    getGraphStoreSingleton()
      .disconnect()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error({ err: error }, "Failed to close graph store");
        process.exit(1);
      });
  });
}

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));
