import { appConfig, requireSetting } from "../config.js";
import { buildAnswerPrompt } from "../prompts/answer.js";
import { logger } from "../utils/logger.js";
import type { LLMConfig, LLMServiceLike, OpenAICompatibleClient } from "./llmTypes.js";
import { createOpenAICompatibleClient } from "./openaiClient.js";

export const NO_RESPONSE_SENTINEL = "No response received from the language model.";
export const GENERATION_ERROR_SENTINEL = "Error generating response.";

type NormalizedLLMConfig = LLMConfig & {
  temperature: number;
  maxTokens: number;
};

export class LLMService implements LLMServiceLike {
  private readonly client: OpenAICompatibleClient;
  private readonly config: NormalizedLLMConfig;

  constructor(config: LLMConfig, deps?: { client?: OpenAICompatibleClient }) {
    this.config = {
      ...config,
      temperature: config.temperature ?? 0.2,
      maxTokens: config.maxTokens ?? 1024
    };

    this.client =
      deps?.client ??
      createOpenAICompatibleClient({
        apiKey: this.config.apiKey,
        ...(this.config.baseURL ? { baseURL: this.config.baseURL } : {})
      });
  }

  static fromEnv(): LLMService {
    return new LLMService({
      apiKey: requireSetting("GEMINI_API_KEY"),
      baseURL: appConfig.GEMINI_BASE_URL,
      chatModel: appConfig.GEMINI_CHAT_MODEL
    });
  }

  /**
   * Never throws: an empty or malformed response and a failed call each map to
   * a fixed sentinel so the chat turn can still complete.
   */
  async generateAnswer(context: string, question: string): Promise<string> {
    try {
      const answer = await this.complete(buildAnswerPrompt(context, question));
      return answer ?? NO_RESPONSE_SENTINEL;
    } catch (error) {
      logger.error({ err: error }, "Error generating answer");
      return GENERATION_ERROR_SENTINEL;
    }
  }

  async probe(): Promise<string> {
    const answer = await this.complete("Hello!");
    if (answer === null) {
      throw new Error("Language model returned no text");
    }
    return answer;
  }

  private async complete(prompt: string): Promise<string | null> {
    const response = await this.client.chat.completions.create({
      model: this.config.chatModel,
      temperature: this.config.temperature,
      max_tokens: this.config.maxTokens,
      messages: [{ role: "user", content: prompt }]
    });

    logger.debug(
      {
        model: this.config.chatModel,
        promptTokens: response.usage?.prompt_tokens ?? 0,
        completionTokens: response.usage?.completion_tokens ?? 0
      },
      "Chat completion finished"
    );

    const content = response.choices?.[0]?.message?.content;
    if (typeof content !== "string") {
      return null;
    }
    const trimmed = content.trim();
    return trimmed.length > 0 ? trimmed : null;
  }
}
