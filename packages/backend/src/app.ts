import cors from "cors";
import express, { type NextFunction, type Request, type Response } from "express";
import { appConfig } from "./config.js";
import { requestLogger } from "./middleware/logger.js";
import { apiRateLimiter } from "./middleware/rateLimiter.js";
import { createChatRouter } from "./routes/chat.js";
import { createGraphRouter } from "./routes/graph.js";
import { createHealthRouter } from "./routes/health.js";
import { logger } from "./utils/logger.js";

export function createApp(): express.Express {
  const app = express();

  app.use(requestLogger);
  app.use(cors({ origin: appConfig.CORS_ORIGIN }));
  app.use(express.json({ limit: "100kb" }));
  app.use("/api", apiRateLimiter);

  app.use("/api/chat", createChatRouter());
  app.use("/api/graph", createGraphRouter());
  app.use("/api/health", createHealthRouter());

  app.use((_req, res) => {
    res.status(404).json({ error: "Route not found" });
  });

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    logger.error({ err }, "Unhandled error");
    res.status(500).json({ error: "Internal server error" });
  });

  return app;
}
