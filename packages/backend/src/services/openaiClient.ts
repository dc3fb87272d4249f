import OpenAI from "openai";
import type { OpenAICompatibleClient } from "./llmTypes.js";

export function createOpenAICompatibleClient(options: {
  apiKey: string;
  baseURL?: string;
}): OpenAICompatibleClient {
  const client = new OpenAI({
    apiKey: options.apiKey,
    ...(options.baseURL ? { baseURL: options.baseURL } : {})
  });

  return {
    chat: {
      completions: {
        create: (body) => client.chat.completions.create(body)
      }
    },
    embeddings: {
      create: (body) => client.embeddings.create(body)
    }
  };
}
