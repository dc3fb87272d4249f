import type {
  ChatSession,
  ChatSessionDetailResponse,
  ChatTurn,
  CreateChatMessageRequest,
  CreateChatMessageResponse,
  CreateChatSessionRequest,
  CreateChatSessionResponse,
  GraphOverviewResponse,
  HealthResponse,
  ListChatSessionsResponse
} from "@supply-rag/shared";

export class ApiClientError extends Error {
  readonly status: number;
  readonly details?: unknown;

  constructor(message: string, status: number, details?: unknown) {
    super(message);
    this.name = "ApiClientError";
    this.status = status;
    this.details = details;
  }
}

type HttpMethod = "GET" | "POST" | "DELETE";
type QueryParams = Record<string, string | number | undefined>;

interface RequestOptions {
  method?: HttpMethod;
  query?: QueryParams;
  json?: unknown;
  signal?: AbortSignal | undefined;
}

interface RawChatSession extends Omit<ChatSession, "createdAt" | "updatedAt"> {
  createdAt: string | Date;
  updatedAt: string | Date;
}

interface RawChatTurn extends Omit<ChatTurn, "createdAt"> {
  createdAt: string | Date;
}

export interface ChatSessionDetail {
  session: ChatSession;
  messages: ChatTurn[];
}

const API_BASE_URL = resolveApiBaseUrl(import.meta.env.VITE_API_BASE_URL);

export function resolveApiBaseUrl(rawBaseUrl: string | undefined): string {
  if (!rawBaseUrl || rawBaseUrl.trim().length === 0) {
    return "http://localhost:3001/api";
  }

  const trimmed = rawBaseUrl.trim().replace(/\/+$/, "");
  if (trimmed.endsWith("/api")) {
    return trimmed;
  }
  return `${trimmed}/api`;
}

function buildQuery(query?: QueryParams): string {
  if (!query) {
    return "";
  }

  const searchParams = new URLSearchParams();
  for (const [key, value] of Object.entries(query)) {
    if (value !== undefined) {
      searchParams.set(key, String(value));
    }
  }

  const serialized = searchParams.toString();
  return serialized.length > 0 ? `?${serialized}` : "";
}

function toDate(value: string | Date): Date {
  if (value instanceof Date) {
    return value;
  }
  const parsed = new Date(value);
  if (Number.isNaN(parsed.getTime())) {
    return new Date(0);
  }
  return parsed;
}

function parseChatSession(raw: RawChatSession): ChatSession {
  return {
    ...raw,
    createdAt: toDate(raw.createdAt),
    updatedAt: toDate(raw.updatedAt)
  };
}

function parseChatTurn(raw: RawChatTurn): ChatTurn {
  return {
    ...raw,
    createdAt: toDate(raw.createdAt)
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

async function readErrorPayload(response: Response): Promise<{ message: string; details?: unknown }> {
  const fallback = `Request failed with status ${response.status}`;
  const contentType = response.headers.get("content-type") ?? "";
  if (!contentType.includes("application/json")) {
    const text = await response.text();
    return { message: text.trim().length > 0 ? text : fallback };
  }

  let payload: unknown;
  try {
    payload = await response.json();
  } catch {
    return { message: fallback };
  }

  if (!isRecord(payload)) {
    return { message: fallback };
  }

  return {
    message: typeof payload.error === "string" ? payload.error : fallback,
    details: payload.details
  };
}

async function request<T>(path: string, options: RequestOptions = {}): Promise<T | undefined> {
  const url = `${API_BASE_URL}${path}${buildQuery(options.query)}`;
  const requestInit: RequestInit = {
    method: options.method ?? "GET"
  };
  if (options.json !== undefined) {
    requestInit.headers = { "Content-Type": "application/json" };
    requestInit.body = JSON.stringify(options.json);
  }
  if (options.signal !== undefined) {
    requestInit.signal = options.signal;
  }

  const response = await fetch(url, requestInit);

  if (!response.ok) {
    const { message, details } = await readErrorPayload(response);
    throw new ApiClientError(message, response.status, details);
  }

  if (response.status === 204) {
    return undefined;
  }

  const contentType = response.headers.get("content-type") ?? "";
  if (!contentType.includes("application/json")) {
    throw new ApiClientError("Unexpected response type from API", response.status);
  }

  return (await response.json()) as T;
}

async function requestJson<T>(path: string, options: RequestOptions = {}): Promise<T> {
  const data = await request<T>(path, options);
  if (data === undefined) {
    throw new ApiClientError("Empty response from API", 204);
  }
  return data;
}

export const apiClient = {
  chat: {
    async createSession(input: CreateChatSessionRequest = {}, signal?: AbortSignal): Promise<ChatSession> {
      const data = await requestJson<CreateChatSessionResponse>("/chat/sessions", {
        method: "POST",
        json: input,
        signal
      });
      return parseChatSession(data.session as RawChatSession);
    },

    async listSessions(params?: { limit?: number; signal?: AbortSignal }): Promise<ChatSession[]> {
      const data = await requestJson<ListChatSessionsResponse>("/chat/sessions", {
        query: { limit: params?.limit },
        signal: params?.signal
      });
      return data.sessions.map((session) => parseChatSession(session as RawChatSession));
    },

    async getSessionDetail(id: string, signal?: AbortSignal): Promise<ChatSessionDetail> {
      const data = await requestJson<ChatSessionDetailResponse>(`/chat/sessions/${encodeURIComponent(id)}`, {
        signal
      });
      const { messages, ...session } = data.session;
      return {
        session: parseChatSession(session as RawChatSession),
        messages: messages.map((message) => parseChatTurn(message as RawChatTurn))
      };
    },

    async deleteSession(id: string, signal?: AbortSignal): Promise<void> {
      await request<void>(`/chat/sessions/${encodeURIComponent(id)}`, {
        method: "DELETE",
        signal
      });
    },

    async sendMessage(id: string, input: CreateChatMessageRequest, signal?: AbortSignal): Promise<ChatTurn> {
      const data = await requestJson<CreateChatMessageResponse>(
        `/chat/sessions/${encodeURIComponent(id)}/messages`,
        {
          method: "POST",
          json: input,
          signal
        }
      );
      return parseChatTurn(data.message as RawChatTurn);
    }
  },

  graph: {
    async getOverview(signal?: AbortSignal): Promise<GraphOverviewResponse> {
      return requestJson<GraphOverviewResponse>("/graph/overview", { signal });
    }
  },

  health: {
    async get(signal?: AbortSignal): Promise<HealthResponse> {
      return requestJson<HealthResponse>("/health", { signal });
    }
  }
};
