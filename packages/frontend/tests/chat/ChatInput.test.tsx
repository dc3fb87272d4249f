import { cleanup, fireEvent, render, screen } from "@testing-library/react";
import { afterEach, describe, expect, it, vi } from "vitest";
import { ChatInput, MAX_QUESTION_LENGTH } from "../../src/chat/ChatInput";

afterEach(cleanup);

describe("ChatInput", () => {
  it("sends the trimmed question on Enter and clears the box", () => {
    const onSend = vi.fn().mockResolvedValue(undefined);
    render(<ChatInput isWaiting={false} onSend={onSend} />);

    const textarea = screen.getByLabelText("Question");
    fireEvent.change(textarea, { target: { value: "  Where are the laptops stored?  " } });
    fireEvent.keyDown(textarea, { key: "Enter" });

    expect(onSend).toHaveBeenCalledWith("Where are the laptops stored?");
    expect(textarea).toHaveProperty("value", "");
  });

  it("keeps Shift+Enter as a newline", () => {
    const onSend = vi.fn().mockResolvedValue(undefined);
    render(<ChatInput isWaiting={false} onSend={onSend} />);

    const textarea = screen.getByLabelText("Question");
    fireEvent.change(textarea, { target: { value: "first line" } });
    fireEvent.keyDown(textarea, { key: "Enter", shiftKey: true });

    expect(onSend).not.toHaveBeenCalled();
  });

  it("ignores blank input", () => {
    const onSend = vi.fn().mockResolvedValue(undefined);
    render(<ChatInput isWaiting={false} onSend={onSend} />);

    fireEvent.change(screen.getByLabelText("Question"), { target: { value: "   " } });

    expect(screen.getByRole("button", { name: "Send message" })).toHaveProperty("disabled", true);
    fireEvent.keyDown(screen.getByLabelText("Question"), { key: "Enter" });
    expect(onSend).not.toHaveBeenCalled();
  });

  it("locks input while an answer is pending", () => {
    const onSend = vi.fn().mockResolvedValue(undefined);
    render(<ChatInput isWaiting onSend={onSend} />);

    expect(screen.getByLabelText("Question")).toHaveProperty("disabled", true);
    expect(screen.getByRole("button", { name: "Send message" })).toHaveProperty("disabled", true);
  });

  it("shows a length counter only near the character limit", () => {
    render(<ChatInput isWaiting={false} onSend={vi.fn().mockResolvedValue(undefined)} />);
    const textarea = screen.getByLabelText("Question");

    fireEvent.change(textarea, { target: { value: "a".repeat(1799) } });
    expect(screen.queryByText(`1799/${MAX_QUESTION_LENGTH}`)).toBeNull();

    fireEvent.change(textarea, { target: { value: "a".repeat(1800) } });
    expect(screen.getByText("1800/2000").className).toBe("chat-input-counter");
    expect(textarea).toHaveProperty("maxLength", 2000);
  });
});
