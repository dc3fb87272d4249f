import { Lightbulb, MessageSquare, PenSquare, Trash2 } from "lucide-react";
import type { ChatSession } from "@supply-rag/shared";

export const exampleQuestions = [
  "What products are available?",
  "Where are the laptops stored?",
  "Which suppliers provide smartphones?",
  "What audio products are available?",
  "Tell me about the supply chain for tablets"
];

interface ChatSidebarProps {
  sessions: ChatSession[];
  currentSessionId: string | null;
  examplesDisabled: boolean;
  onCreateSession: () => Promise<void>;
  onSelectSession: (sessionId: string) => void;
  onDeleteSession: (session: ChatSession) => Promise<void>;
  onAskExample: (question: string) => void;
}

function formatTime(date: Date): string {
  return new Intl.DateTimeFormat("en-GB", {
    month: "2-digit",
    day: "2-digit",
    hour: "2-digit",
    minute: "2-digit"
  }).format(date);
}

export function ChatSidebar({
  sessions,
  currentSessionId,
  examplesDisabled,
  onCreateSession,
  onSelectSession,
  onDeleteSession,
  onAskExample
}: ChatSidebarProps) {
  return (
    <aside className="side-panel chat-sidebar">
      <div className="side-header-row">
        <p className="chat-sidebar-section-label">Conversations</p>
        <button
          type="button"
          className="icon-action-button"
          title="New Chat"
          onClick={() => {
            void onCreateSession();
          }}
          aria-label="New session"
        >
          <PenSquare size={16} />
        </button>
      </div>

      <div className="chat-session-list">
        {sessions.length === 0 ? <p className="muted">No sessions yet</p> : null}

        {sessions.map((session) => (
          <div key={session.id} className="chat-session-item" data-selected={session.id === currentSessionId}>
            <MessageSquare size={15} strokeWidth={2} className="chat-session-icon" />
            <button type="button" className="chat-session-main" onClick={() => onSelectSession(session.id)}>
              <span className="chat-session-title">{session.title}</span>
              <span className="chat-session-time">{formatTime(session.updatedAt)}</span>
            </button>
            <button
              type="button"
              className="chat-delete-button"
              onClick={() => {
                void onDeleteSession(session);
              }}
              aria-label={`Delete ${session.title}`}
            >
              <Trash2 size={13} />
            </button>
          </div>
        ))}
      </div>

      <section className="chat-sidebar-section" aria-labelledby="chat-about-heading">
        <h3 id="chat-about-heading" className="chat-sidebar-section-label">
          About
        </h3>
        <p className="muted">
          This assistant answers questions about products, suppliers and warehouses. Each question is
          matched against product descriptions in the supply chain graph, and the closest products are
          passed to the language model together with their suppliers and storage locations.
        </p>
      </section>

      <section className="chat-sidebar-section" aria-labelledby="chat-examples-heading">
        <h3 id="chat-examples-heading" className="chat-sidebar-section-label">
          Example questions
        </h3>
        <ul className="chat-example-list">
          {exampleQuestions.map((question) => (
            <li key={question}>
              <button
                type="button"
                className="chat-example-button"
                disabled={examplesDisabled}
                onClick={() => onAskExample(question)}
              >
                <Lightbulb size={13} />
                <span>{question}</span>
              </button>
            </li>
          ))}
        </ul>
      </section>
    </aside>
  );
}
