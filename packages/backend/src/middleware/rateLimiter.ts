import rateLimit from "express-rate-limit";
import { appConfig } from "../config.js";

export const apiRateLimiter = rateLimit({
  windowMs: appConfig.RATE_LIMIT_WINDOW_MS,
  limit: appConfig.RATE_LIMIT_MAX,
  standardHeaders: "draft-7",
  legacyHeaders: false,
  message: { error: "Too many requests" }
});
