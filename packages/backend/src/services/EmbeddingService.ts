import { appConfig, requireSetting } from "../config.js";
import { EmbeddingDimensionError } from "../errors.js";
import type {
  EmbeddingConfig,
  EmbeddingServiceLike,
  OpenAICompatibleClient
} from "./llmTypes.js";
import { createOpenAICompatibleClient } from "./openaiClient.js";

/**
 * Maps text to a fixed-length vector through a hosted embedding model.
 *
 * Construct once per process and pass the instance to its consumers. It holds
 * no mutable state after construction, so concurrent sessions may share it.
 */
export class EmbeddingService implements EmbeddingServiceLike {
  readonly dimensions: number;
  private readonly client: OpenAICompatibleClient;
  private readonly model: string;

  constructor(config: EmbeddingConfig, deps?: { client?: OpenAICompatibleClient }) {
    this.dimensions = config.dimensions;
    this.model = config.model;
    this.client =
      deps?.client ??
      createOpenAICompatibleClient({
        apiKey: config.apiKey,
        ...(config.baseURL ? { baseURL: config.baseURL } : {})
      });
  }

  static fromEnv(): EmbeddingService {
    const apiKey = appConfig.EMBEDDING_API_KEY || requireSetting("GEMINI_API_KEY");
    const baseURL = appConfig.EMBEDDING_BASE_URL || appConfig.GEMINI_BASE_URL;

    return new EmbeddingService({
      apiKey,
      baseURL,
      model: appConfig.EMBEDDING_MODEL,
      dimensions: appConfig.EMBEDDING_DIMENSIONS
    });
  }

  async encode(text: string): Promise<number[]> {
    const response = await this.client.embeddings.create({
      model: this.model,
      input: text,
      dimensions: this.dimensions
    });

    const embedding = response.data?.[0]?.embedding ?? [];
    if (embedding.length !== this.dimensions) {
      throw new EmbeddingDimensionError(this.dimensions, embedding.length);
    }
    return embedding;
  }
}
