export type ChatRole = "user" | "assistant";

export type ChatSessionState = "awaiting_input" | "processing";

export interface ChatSession {
  id: string;
  title: string;
  state: ChatSessionState;
  createdAt: Date;
  updatedAt: Date;
}

export interface ChatTurn {
  id: string;
  sessionId: string;
  role: ChatRole;
  content: string;
  createdAt: Date;
}
