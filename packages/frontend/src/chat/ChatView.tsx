import { useCallback, useEffect, useState } from "react";
import type { ChatSession } from "@supply-rag/shared";
import { apiClient } from "../services/api";
import { useChatStore } from "../stores/useChatStore";
import { ChatInput } from "./ChatInput";
import { ChatMessages } from "./ChatMessages";
import { ChatSidebar } from "./ChatSidebar";

function createDefaultSessionTitle(): string {
  return `Session ${new Date().toLocaleString("en-GB", {
    month: "2-digit",
    day: "2-digit",
    hour: "2-digit",
    minute: "2-digit"
  })}`;
}

function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === "AbortError";
}

function errorMessage(error: unknown, fallback: string): string {
  return error instanceof Error ? error.message : fallback;
}

export function ChatView() {
  const sessions = useChatStore((state) => state.sessions);
  const currentSessionId = useChatStore((state) => state.currentSessionId);
  const messagesBySession = useChatStore((state) => state.messagesBySession);
  const pendingQuestion = useChatStore((state) => state.pendingQuestion);
  const setSessions = useChatStore((state) => state.setSessions);
  const upsertSession = useChatStore((state) => state.upsertSession);
  const removeSession = useChatStore((state) => state.removeSession);
  const setCurrentSessionId = useChatStore((state) => state.setCurrentSessionId);
  const setMessages = useChatStore((state) => state.setMessages);
  const startQuestion = useChatStore((state) => state.startQuestion);
  const finishQuestion = useChatStore((state) => state.finishQuestion);

  const [isLoadingSessions, setIsLoadingSessions] = useState(false);
  const [isLoadingMessages, setIsLoadingMessages] = useState(false);
  const [viewError, setViewError] = useState<string | null>(null);

  const loadSessions = useCallback(
    async (signal?: AbortSignal) => {
      setIsLoadingSessions(true);
      setViewError(null);

      try {
        const params: { limit: number; signal?: AbortSignal } = { limit: 100 };
        if (signal) {
          params.signal = signal;
        }
        setSessions(await apiClient.chat.listSessions(params));
      } catch (error) {
        if (isAbortError(error)) {
          return;
        }
        setViewError(errorMessage(error, "Failed to load sessions"));
      } finally {
        setIsLoadingSessions(false);
      }
    },
    [setSessions]
  );

  const loadSessionDetail = useCallback(
    async (sessionId: string, signal?: AbortSignal) => {
      setIsLoadingMessages(true);
      setViewError(null);

      try {
        const detail = await apiClient.chat.getSessionDetail(sessionId, signal);
        setMessages(sessionId, detail.messages);
        upsertSession(detail.session);
      } catch (error) {
        if (isAbortError(error)) {
          return;
        }
        setViewError(errorMessage(error, "Failed to load messages"));
      } finally {
        setIsLoadingMessages(false);
      }
    },
    [setMessages, upsertSession]
  );

  useEffect(() => {
    const controller = new AbortController();
    void loadSessions(controller.signal);
    return () => controller.abort();
  }, [loadSessions]);

  useEffect(() => {
    if (!currentSessionId) {
      return;
    }

    const controller = new AbortController();
    void loadSessionDetail(currentSessionId, controller.signal);
    return () => controller.abort();
  }, [currentSessionId, loadSessionDetail]);

  const createSession = useCallback(async (): Promise<ChatSession | null> => {
    setViewError(null);

    try {
      const session = await apiClient.chat.createSession({ title: createDefaultSessionTitle() });
      upsertSession(session);
      setCurrentSessionId(session.id);
      setMessages(session.id, []);
      return session;
    } catch (error) {
      setViewError(errorMessage(error, "Failed to create session"));
      return null;
    }
  }, [setCurrentSessionId, setMessages, upsertSession]);

  const handleCreateSession = useCallback(async () => {
    await createSession();
  }, [createSession]);

  const handleDeleteSession = useCallback(
    async (session: ChatSession) => {
      if (!window.confirm(`Delete session "${session.title}"?`)) {
        return;
      }

      setViewError(null);
      try {
        await apiClient.chat.deleteSession(session.id);
        removeSession(session.id);
      } catch (error) {
        setViewError(errorMessage(error, "Failed to delete session"));
      }
    },
    [removeSession]
  );

  const ask = useCallback(
    async (sessionId: string, content: string) => {
      setViewError(null);
      startQuestion(sessionId, content);

      try {
        await apiClient.chat.sendMessage(sessionId, { content });
        await loadSessionDetail(sessionId);
      } catch (error) {
        setViewError(errorMessage(error, "Failed to send message"));
      } finally {
        finishQuestion();
      }
    },
    [finishQuestion, loadSessionDetail, startQuestion]
  );

  const handleSend = useCallback(
    async (content: string) => {
      const sessionId = currentSessionId ?? (await createSession())?.id;
      if (!sessionId) {
        return;
      }
      await ask(sessionId, content);
    },
    [ask, createSession, currentSessionId]
  );

  const currentMessages = currentSessionId ? (messagesBySession[currentSessionId] ?? []) : [];
  const isWaiting = pendingQuestion !== null;

  return (
    <section className="page-shell chat-page-shell">
      <div className="chat-layout">
        <ChatSidebar
          sessions={sessions}
          currentSessionId={currentSessionId}
          examplesDisabled={isWaiting}
          onCreateSession={handleCreateSession}
          onSelectSession={setCurrentSessionId}
          onDeleteSession={handleDeleteSession}
          onAskExample={(question) => {
            void handleSend(question);
          }}
        />

        <div className="chat-main-column">
          <div className="chat-container-inner">
            <div className="chat-column-header">
              <h2 className="chat-column-title">Supply Chain Assistant</h2>
            </div>

            <ChatMessages
              messages={currentMessages}
              pendingQuestion={pendingQuestion?.sessionId === currentSessionId ? pendingQuestion.content : null}
            />

            <ChatInput disabled={isLoadingSessions || isLoadingMessages} isWaiting={isWaiting} onSend={handleSend} />
          </div>
        </div>
      </div>

      {viewError ? <p className="error-banner">{viewError}</p> : null}
    </section>
  );
}
