export interface TokenUsage {
  prompt_tokens?: number;
  completion_tokens?: number;
  total_tokens?: number;
}

export interface ChatCompletionRequest {
  model: string;
  messages: Array<{ role: "user"; content: string }>;
  temperature?: number;
  max_tokens?: number;
}

export interface ChatCompletionResponse {
  choices?: Array<{
    message?: {
      content?: string | null;
    };
  }>;
  usage?: TokenUsage;
}

export interface EmbeddingRequest {
  model: string;
  input: string;
  dimensions?: number;
}

export interface EmbeddingResponse {
  data?: Array<{
    embedding?: number[];
  }>;
  usage?: TokenUsage;
}

/**
 * The slice of an OpenAI-compatible SDK the services call. Tests hand in
 * plain objects with `vi.fn()` members.
 */
export interface OpenAICompatibleClient {
  chat: {
    completions: {
      create: (body: ChatCompletionRequest) => Promise<ChatCompletionResponse>;
    };
  };
  embeddings: {
    create: (body: EmbeddingRequest) => Promise<EmbeddingResponse>;
  };
}

export interface LLMConfig {
  apiKey: string;
  baseURL?: string;
  chatModel: string;
  temperature?: number;
  maxTokens?: number;
}

export interface EmbeddingConfig {
  apiKey: string;
  baseURL?: string;
  model: string;
  dimensions: number;
}

export interface LLMServiceLike {
  generateAnswer(context: string, question: string): Promise<string>;
  probe(): Promise<string>;
}

export interface EmbeddingServiceLike {
  readonly dimensions: number;
  encode(text: string): Promise<number[]>;
}
