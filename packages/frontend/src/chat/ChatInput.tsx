import { ArrowUp } from "lucide-react";
import { useLayoutEffect, useRef, useState } from "react";

export const MAX_QUESTION_LENGTH = 2000;
const COUNTER_THRESHOLD = 1800;
const MAX_BOX_HEIGHT_PX = 180;

interface ChatInputProps {
  disabled?: boolean;
  isWaiting: boolean;
  onSend: (content: string) => Promise<void>;
}

export function ChatInput({ disabled = false, isWaiting, onSend }: ChatInputProps) {
  const [question, setQuestion] = useState("");
  const boxRef = useRef<HTMLTextAreaElement | null>(null);
  const locked = disabled || isWaiting;
  const trimmed = question.trim();

  // The box grows with its content up to MAX_BOX_HEIGHT_PX, then scrolls.
  useLayoutEffect(() => {
    const box = boxRef.current;
    if (!box) {
      return;
    }
    box.style.height = "auto";
    box.style.height = `${Math.min(box.scrollHeight, MAX_BOX_HEIGHT_PX)}px`;
  }, [question]);

  const ask = async () => {
    if (trimmed.length === 0 || locked) {
      return;
    }
    setQuestion("");
    await onSend(trimmed);
  };

  return (
    <section className="chat-input-panel">
      <div className="chat-input-area">
        <textarea
          ref={boxRef}
          value={question}
          onChange={(event) => setQuestion(event.currentTarget.value)}
          onKeyDown={(event) => {
            if (event.key === "Enter" && !event.shiftKey) {
              event.preventDefault();
              void ask();
            }
          }}
          disabled={locked}
          placeholder="Ask about products, suppliers or warehouses..."
          aria-label="Question"
          rows={1}
          maxLength={MAX_QUESTION_LENGTH}
        />
        <button
          type="button"
          className="chat-send-button"
          disabled={trimmed.length === 0 || locked}
          onClick={() => {
            void ask();
          }}
          aria-label="Send message"
        >
          <ArrowUp size={16} strokeWidth={2.5} />
        </button>
      </div>
      {question.length >= COUNTER_THRESHOLD ? (
        <p className="chat-input-counter" aria-live="polite">
          {`${question.length}/${MAX_QUESTION_LENGTH}`}
        </p>
      ) : null}
    </section>
  );
}
