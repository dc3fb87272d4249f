import { useEffect, useRef } from "react";
import { Bot, User } from "lucide-react";
import type { ChatTurn } from "@supply-rag/shared";

interface ChatMessagesProps {
  messages: ChatTurn[];
  pendingQuestion: string | null;
}

function formatMessageTime(date: Date): string {
  return new Intl.DateTimeFormat("en-GB", {
    hour: "2-digit",
    minute: "2-digit"
  }).format(date);
}

export function ChatMessages({ messages, pendingQuestion }: ChatMessagesProps) {
  const messagesEndRef = useRef<HTMLDivElement>(null);

  useEffect(() => {
    // jsdom has no scrollIntoView
    messagesEndRef.current?.scrollIntoView?.({ behavior: "smooth" });
  }, [messages.length, pendingQuestion]);

  return (
    <section className="chat-messages-panel" aria-label="Chat messages">
      <div className="chat-message-list">
        {messages.length === 0 && pendingQuestion === null ? (
          <p className="muted chat-empty">No messages yet. Ask a question about the supply chain.</p>
        ) : null}

        {messages.map((message) => {
          const isAssistant = message.role === "assistant";

          return (
            <article
              key={message.id}
              className={isAssistant ? "chat-message-card is-assistant" : "chat-message-card is-user"}
              data-role={message.role}
            >
              <span className={isAssistant ? "message-icon" : "message-icon user-avatar-icon"}>
                {isAssistant ? <Bot size={15} strokeWidth={2.5} /> : <User size={15} strokeWidth={2.5} />}
              </span>

              <div className="chat-message-body">
                <div className="chat-message-bubble">
                  <p>{message.content}</p>
                </div>
                <small>{formatMessageTime(message.createdAt)}</small>
              </div>
            </article>
          );
        })}

        {pendingQuestion !== null ? (
          <>
            <article className="chat-message-card is-user" data-role="user">
              <span className="message-icon user-avatar-icon">
                <User size={15} strokeWidth={2.5} />
              </span>
              <div className="chat-message-body">
                <div className="chat-message-bubble">
                  <p>{pendingQuestion}</p>
                </div>
              </div>
            </article>
            <article className="chat-message-card is-assistant is-waiting" aria-live="polite">
              <span className="message-icon">
                <Bot size={15} strokeWidth={2.5} />
              </span>
              <div className="chat-message-body">
                <div className="chat-message-bubble">
                  <p>Thinking...</p>
                </div>
              </div>
            </article>
          </>
        ) : null}

        <div ref={messagesEndRef} />
      </div>
    </section>
  );
}
