import { randomUUID } from "node:crypto";
import type { ChatRole, ChatSession, ChatSessionState, ChatTurn } from "@supply-rag/shared";
import type { ChatStoreLike } from "./ChatStore.js";
import { ChatSessionNotFoundError } from "./ChatService.js";

export class InMemoryChatStore implements ChatStoreLike {
  private readonly sessions = new Map<string, ChatSession>();
  private readonly sessionTurns = new Map<string, ChatTurn[]>();

  createSession(input: { title: string; id?: string }): ChatSession {
    const now = new Date();
    const session: ChatSession = {
      id: input.id ?? randomUUID(),
      title: input.title,
      state: "awaiting_input",
      createdAt: now,
      updatedAt: now
    };

    this.sessions.set(session.id, session);
    this.sessionTurns.set(session.id, []);
    return session;
  }

  listSessions(limit = 100): ChatSession[] {
    const safeLimit = Math.max(1, limit);
    return [...this.sessions.values()]
      .sort((a, b) => b.updatedAt.getTime() - a.updatedAt.getTime())
      .slice(0, safeLimit);
  }

  getSessionById(id: string): ChatSession | null {
    return this.sessions.get(id) ?? null;
  }

  setSessionState(id: string, state: ChatSessionState): ChatSession | null {
    const session = this.sessions.get(id);
    if (!session) {
      return null;
    }

    const updated: ChatSession = { ...session, state };
    this.sessions.set(id, updated);
    return updated;
  }

  deleteSession(id: string): boolean {
    const existed = this.sessions.delete(id);
    this.sessionTurns.delete(id);
    return existed;
  }

  addTurn(input: { sessionId: string; role: ChatRole; content: string; id?: string }): ChatTurn {
    const session = this.sessions.get(input.sessionId);
    if (!session) {
      throw new ChatSessionNotFoundError(input.sessionId);
    }

    const turn: ChatTurn = {
      id: input.id ?? randomUUID(),
      sessionId: input.sessionId,
      role: input.role,
      content: input.content,
      createdAt: new Date()
    };

    const turns = this.sessionTurns.get(input.sessionId) ?? [];
    turns.push(turn);
    this.sessionTurns.set(input.sessionId, turns);

    this.sessions.set(input.sessionId, {
      ...session,
      updatedAt: turn.createdAt
    });

    return turn;
  }

  listTurnsBySession(sessionId: string): ChatTurn[] {
    return [...(this.sessionTurns.get(sessionId) ?? [])];
  }

  getSessionWithTurns(sessionId: string): { session: ChatSession; turns: ChatTurn[] } | null {
    const session = this.getSessionById(sessionId);
    if (!session) {
      return null;
    }

    return {
      session,
      turns: this.listTurnsBySession(sessionId)
    };
  }
}
