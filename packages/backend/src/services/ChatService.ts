import type { ChatSession, ChatTurn } from "@supply-rag/shared";
import type { ChatStoreLike } from "./ChatStore.js";
import type { LLMServiceLike } from "./llmTypes.js";
import type { RetrievalServiceLike } from "./RetrievalService.js";

export class ChatSessionNotFoundError extends Error {
  constructor(sessionId: string) {
    super(`Chat session does not exist: ${sessionId}`);
    this.name = "ChatSessionNotFoundError";
  }
}

export class ChatSessionBusyError extends Error {
  constructor(sessionId: string) {
    super(`Chat session is still processing a question: ${sessionId}`);
    this.name = "ChatSessionBusyError";
  }
}

export interface ChatTurnResult {
  userTurn: ChatTurn;
  assistantTurn: ChatTurn;
  context: string;
}

/**
 * Runs one question per turn: awaiting_input -> processing -> awaiting_input.
 * Retrieval and generation never throw, so a turn always ends with both a
 * user and an assistant entry in the history.
 */
export class ChatService {
  constructor(
    private readonly chatStore: ChatStoreLike,
    private readonly retrievalService: RetrievalServiceLike,
    private readonly llmService: LLMServiceLike
  ) {}

  createSession(input: { title: string }): ChatSession {
    return this.chatStore.createSession(input);
  }

  listSessions(limit?: number): ChatSession[] {
    return this.chatStore.listSessions(limit);
  }

  getSessionWithTurns(sessionId: string): { session: ChatSession; turns: ChatTurn[] } | null {
    return this.chatStore.getSessionWithTurns(sessionId);
  }

  deleteSession(sessionId: string): boolean {
    return this.chatStore.deleteSession(sessionId);
  }

  async ask(sessionId: string, question: string): Promise<ChatTurnResult> {
    const session = this.chatStore.getSessionById(sessionId);
    if (!session) {
      throw new ChatSessionNotFoundError(sessionId);
    }
    if (session.state === "processing") {
      throw new ChatSessionBusyError(sessionId);
    }

    this.chatStore.setSessionState(sessionId, "processing");
    try {
      const userTurn = this.chatStore.addTurn({ sessionId, role: "user", content: question });
      const context = await this.retrievalService.retrieve(question);
      const answer = await this.llmService.generateAnswer(context, question);
      const assistantTurn = this.chatStore.addTurn({ sessionId, role: "assistant", content: answer });

      return { userTurn, assistantTurn, context };
    } finally {
      this.chatStore.setSessionState(sessionId, "awaiting_input");
    }
  }
}
