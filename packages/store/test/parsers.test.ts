import { describe, expect, it } from "vitest";

import { parseMessageLines, parseTelegramMessage } from "../src/parsers";

const rawMessage = {
  message_id: 42,
  date: 1714550400,
  chat: { id: -1001234567890, type: "supergroup", title: "Reading Club" },
  from: { id: 7, first_name: "Alice", last_name: "Liddell", username: "alice" },
  text: "Has anyone finished chapter three?",
  reply_to_message: { message_id: 40 }
};

describe("parseTelegramMessage", () => {
  it("maps a Bot API message to a history entry", () => {
    expect(parseTelegramMessage(rawMessage)).toEqual({
      chatId: -1001234567890,
      messageId: 42,
      chatTitle: "Reading Club",
      fromName: "Alice Liddell",
      fromUsername: "alice",
      text: "Has anyone finished chapter three?",
      replyToMessageId: 40,
      createdAt: "2024-05-01T08:00:00.000Z"
    });
  });

  it("unwraps updates and falls back to captions", () => {
    const parsed = parseTelegramMessage({
      update_id: 1,
      message: { ...rawMessage, text: undefined, caption: "photo caption", from: { id: 8, username: "bob" } }
    });

    expect(parsed?.text).toBe("photo caption");
    expect(parsed?.fromName).toBe("bob");
  });

  it("ignores messages without text", () => {
    expect(parseTelegramMessage({ ...rawMessage, text: "   " })).toBeUndefined();
    expect(parseTelegramMessage("not a message")).toBeUndefined();
    expect(parseTelegramMessage({ message_id: 1 })).toBeUndefined();
  });
});

describe("parseMessageLines", () => {
  it("counts lines that cannot be ingested", () => {
    const content = [JSON.stringify(rawMessage), "{broken", "", JSON.stringify({ update_id: 2 })].join("\n");

    const result = parseMessageLines(content);

    expect(result.messages.map((message) => message.messageId)).toEqual([42]);
    expect(result.skipped).toBe(2);
  });
});
