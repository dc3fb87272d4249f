import type { ChatSession, ChatTurn } from "./chat.js";
import type { GraphStats } from "../store.js";

export interface ApiErrorResponse {
  error: string;
  details?: unknown;
}

export interface GraphOverviewResponse {
  stats: GraphStats;
}

export interface CreateChatSessionRequest {
  title?: string;
}

export interface CreateChatSessionResponse {
  session: ChatSession;
}

export interface ListChatSessionsResponse {
  sessions: ChatSession[];
}

export interface ChatSessionDetailResponse {
  session: ChatSession & {
    messages: ChatTurn[];
  };
}

export interface CreateChatMessageRequest {
  content: string;
}

export interface CreateChatMessageResponse {
  sessionId: string;
  message: ChatTurn;
}

export type ServiceConnectionStatus = "ok" | "failed" | "not_configured";

export interface HealthResponse {
  status: "ok" | "degraded";
  timestamp: string;
  uptimeSec: number;
  checks: {
    neo4j: ServiceConnectionStatus;
    llm: ServiceConnectionStatus;
  };
  memoryUsage?: {
    rss: number;
    heapUsed: number;
    heapTotal: number;
  };
}
