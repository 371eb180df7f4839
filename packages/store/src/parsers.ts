import type { ChatHistoryMessage } from "./types";

export interface ParsedMessageLines {
  messages: ChatHistoryMessage[];
  skipped: number;
}

/**
 * Converts a Telegram Bot API `Message` (or an `Update` wrapping one) into a
 * history entry. Messages without text or caption are ignored.
 */
export function parseTelegramMessage(raw: unknown): ChatHistoryMessage | undefined {
  const record = asRecord(raw);
  if (!record) {
    return undefined;
  }

  const message = asRecord(record.message) ?? asRecord(record.edited_message) ?? record;
  const chat = asRecord(message.chat);
  const messageId = message.message_id;
  if (!chat || typeof chat.id !== "number" || typeof messageId !== "number") {
    return undefined;
  }

  const text = typeof message.text === "string"
    ? message.text
    : typeof message.caption === "string"
    ? message.caption
    : "";
  if (!text.trim()) {
    return undefined;
  }

  const from = asRecord(message.from);
  const date = typeof message.date === "number" ? new Date(message.date * 1000) : new Date();
  const replyTo = asRecord(message.reply_to_message);

  return {
    chatId: chat.id,
    messageId,
    chatTitle: typeof chat.title === "string" ? chat.title : "",
    fromName: resolveFullName(from),
    fromUsername: from && typeof from.username === "string" ? from.username : undefined,
    text,
    replyToMessageId: replyTo && typeof replyTo.message_id === "number" ? replyTo.message_id : undefined,
    createdAt: date.toISOString()
  };
}

export function parseMessageLines(content: string): ParsedMessageLines {
  const lines = content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter(Boolean);

  const messages: ChatHistoryMessage[] = [];
  let skipped = 0;

  for (const line of lines) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch (error) {
      skipped += 1;
      continue;
    }

    const message = parseTelegramMessage(parsed);
    if (message) {
      messages.push(message);
    } else {
      skipped += 1;
    }
  }

  return { messages, skipped };
}

function resolveFullName(from: Record<string, unknown> | undefined): string {
  if (!from) {
    return "Unknown";
  }
  const parts = [from.first_name, from.last_name].filter(
    (part): part is string => typeof part === "string" && part.trim() !== ""
  );
  if (parts.length) {
    return parts.join(" ");
  }
  return typeof from.username === "string" ? from.username : "Unknown";
}

function asRecord(value: unknown): Record<string, unknown> | undefined {
  if (typeof value === "object" && value !== null && !Array.isArray(value)) {
    return value as Record<string, unknown>;
  }
  return undefined;
}
