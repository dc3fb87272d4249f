import type { ChatRole, ChatSession, ChatSessionState, ChatTurn } from "@supply-rag/shared";

/**
 * Holds chat sessions and their turns. Histories are append-only and are
 * dropped together with their session.
 */
export interface ChatStoreLike {
  createSession(input: { title: string; id?: string }): ChatSession;
  listSessions(limit?: number): ChatSession[];
  getSessionById(id: string): ChatSession | null;
  setSessionState(id: string, state: ChatSessionState): ChatSession | null;
  deleteSession(id: string): boolean;
  addTurn(input: { sessionId: string; role: ChatRole; content: string; id?: string }): ChatTurn;
  listTurnsBySession(sessionId: string): ChatTurn[];
  getSessionWithTurns(sessionId: string): { session: ChatSession; turns: ChatTurn[] } | null;
}
