import type { RequestHandler } from "express";
import { logger } from "../utils/logger.js";

export const requestLogger: RequestHandler = (req, res, next) => {
  const startTime = Date.now();

  res.on("finish", () => {
    const entry = {
      method: req.method,
      url: req.originalUrl,
      statusCode: res.statusCode,
      durationMs: Date.now() - startTime
    };

    if (res.statusCode >= 500) {
      logger.warn(entry, "HTTP request failed");
    } else {
      logger.info(entry, "HTTP request");
    }
  });

  next();
};
