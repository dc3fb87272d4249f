import { dirname, isAbsolute, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { config as loadEnv } from "dotenv";
import { z } from "zod";
import { ConfigurationError } from "./errors.js";

const __dirname = dirname(fileURLToPath(import.meta.url));
export const repoRoot = resolve(__dirname, "../../..");
loadEnv({ path: resolve(repoRoot, ".env") });

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  PORT: z.coerce.number().int().positive().default(3001),
  CORS_ORIGIN: z.string().default("http://localhost:5173"),
  RATE_LIMIT_WINDOW_MS: z.coerce.number().int().positive().default(60_000),
  RATE_LIMIT_MAX: z.coerce.number().int().positive().default(100),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  DATA_DIR: z.string().default("data"),
  NEO4J_URI: z.string().default(""),
  NEO4J_USERNAME: z.string().default(""),
  NEO4J_PASSWORD: z.string().default(""),
  NEO4J_DATABASE: z.string().default("neo4j"),
  GEMINI_API_KEY: z.string().default(""),
  GEMINI_BASE_URL: z.string().default("https://generativelanguage.googleapis.com/v1beta/openai/"),
  GEMINI_CHAT_MODEL: z.string().default("gemini-1.5-flash"),
  EMBEDDING_API_KEY: z.string().default(""),
  EMBEDDING_BASE_URL: z.string().default(""),
  EMBEDDING_MODEL: z.string().default("text-embedding-004"),
  EMBEDDING_DIMENSIONS: z.coerce.number().int().positive().default(384),
  RETRIEVAL_TOP_K: z.coerce.number().int().positive().default(3),
  RETRIEVAL_STRATEGY: z.enum(["brute-force", "vector-index"]).default("brute-force")
});

export type AppConfig = z.infer<typeof envSchema>;
export const appConfig: AppConfig = envSchema.parse(process.env);

const requiredSettings = ["NEO4J_URI", "NEO4J_USERNAME", "NEO4J_PASSWORD", "GEMINI_API_KEY"] as const;

type RequiredSetting = (typeof requiredSettings)[number];

/**
 * Returns a credential or endpoint that has no usable default, read at the
 * point of first use. Throws {@link ConfigurationError} when it is blank.
 */
export function requireSetting(name: RequiredSetting, config: AppConfig = appConfig): string {
  const value = config[name].trim();
  if (value.length === 0) {
    throw new ConfigurationError(name);
  }
  return value;
}

export function missingRequiredSettings(config: AppConfig = appConfig): RequiredSetting[] {
  return requiredSettings.filter((name) => config[name].trim().length === 0);
}

export function resolveDataDir(config: AppConfig = appConfig): string {
  return isAbsolute(config.DATA_DIR) ? config.DATA_DIR : resolve(repoRoot, config.DATA_DIR);
}
