import { TransientNetworkError, describeError, withTimeout } from "../../toolkit/src/index";
import type { ChatType } from "../../store/src/index";

export const TELEGRAM_API_URL = "https://api.telegram.org";

export type ChatMemberStatus = "creator" | "administrator" | "member" | "restricted" | "left" | "kicked";

export interface ChatInfo {
  id: number;
  type: ChatType;
  title?: string;
}

export interface SendMessageInput {
  chatId: number;
  text: string;
  parseMode?: "HTML";
  disableLinkPreview?: boolean;
}

export interface EditMessageInput {
  chatId: number;
  messageId: number;
  text: string;
  parseMode?: "HTML";
}

export interface SentMessage {
  chatId: number;
  messageId: number;
}

/** The messaging operations the recap pipeline needs from a chat platform. */
export interface ChatPlatform {
  sendMessage(input: SendMessageInput): Promise<SentMessage>;
  editMessage(input: EditMessageInput): Promise<void>;
  deleteMessage(chatId: number, messageId: number): Promise<void>;
  pinMessage(chatId: number, messageId: number): Promise<void>;
  unpinMessage(chatId: number, messageId: number): Promise<void>;
  getChat(chatId: number): Promise<ChatInfo>;
  getChatMember(chatId: number, userId: number): Promise<ChatMemberStatus | string>;
}

export interface TelegramBotClientOptions {
  token: string;
  apiUrl?: string;
  fetchImpl?: typeof fetch;
  timeoutMs?: number;
}

const DEFAULT_TIMEOUT_MS = 30_000;

export class TelegramBotClient implements ChatPlatform {
  private readonly baseUrl: string;

  private readonly fetchImpl: typeof fetch;

  private readonly timeoutMs: number;

  constructor(options: TelegramBotClientOptions) {
    const apiUrl = (options.apiUrl ?? TELEGRAM_API_URL).replace(/\/+$/, "");
    this.baseUrl = `${apiUrl}/bot${options.token}`;
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  async sendMessage(input: SendMessageInput): Promise<SentMessage> {
    const result = await this.call("sendMessage", {
      chat_id: input.chatId,
      text: input.text,
      parse_mode: input.parseMode,
      link_preview_options: input.disableLinkPreview ? { is_disabled: true } : undefined
    });
    const messageId = readNumber(result, "message_id");
    if (messageId === undefined) {
      throw new TransientNetworkError("telegram sendMessage returned no message_id");
    }
    return { chatId: input.chatId, messageId };
  }

  async editMessage(input: EditMessageInput): Promise<void> {
    await this.call("editMessageText", {
      chat_id: input.chatId,
      message_id: input.messageId,
      text: input.text,
      parse_mode: input.parseMode
    });
  }

  async deleteMessage(chatId: number, messageId: number): Promise<void> {
    await this.call("deleteMessage", { chat_id: chatId, message_id: messageId });
  }

  async pinMessage(chatId: number, messageId: number): Promise<void> {
    await this.call("pinChatMessage", { chat_id: chatId, message_id: messageId, disable_notification: true });
  }

  async unpinMessage(chatId: number, messageId: number): Promise<void> {
    await this.call("unpinChatMessage", { chat_id: chatId, message_id: messageId });
  }

  async getChat(chatId: number): Promise<ChatInfo> {
    const result = await this.call("getChat", { chat_id: chatId });
    const type = readString(result, "type");
    return {
      id: readNumber(result, "id") ?? chatId,
      type: type === "private" || type === "group" || type === "supergroup" || type === "channel" ? type : "group",
      title: readString(result, "title")
    };
  }

  async getChatMember(chatId: number, userId: number): Promise<ChatMemberStatus | string> {
    const result = await this.call("getChatMember", { chat_id: chatId, user_id: userId });
    const status = readString(result, "status");
    if (!status) {
      throw new TransientNetworkError("telegram getChatMember returned no status");
    }
    return status;
  }

  private async call(method: string, params: Record<string, unknown>): Promise<unknown> {
    let response: Response;
    try {
      response = await withTimeout(this.timeoutMs, (signal) =>
        this.fetchImpl(`${this.baseUrl}/${method}`, {
          method: "POST",
          headers: { "Content-Type": "application/json; charset=utf-8" },
          body: JSON.stringify(params),
          signal
        })
      );
    } catch (error) {
      throw new TransientNetworkError(`telegram ${method} request failed: ${describeError(error)}`, { cause: error });
    }

    const data = parseTelegramResponse(await response.json());
    if (!data.ok) {
      throw new TransientNetworkError(
        `telegram ${method} failed: ${data.description ?? `HTTP ${response.status}`}`
      );
    }
    return data.result;
  }
}

function parseTelegramResponse(value: unknown): { ok: boolean; result?: unknown; description?: string } {
  if (typeof value === "object" && value !== null && "ok" in value) {
    const record = value as Record<string, unknown>;
    return {
      ok: record.ok === true,
      result: record.result,
      description: typeof record.description === "string" ? record.description : undefined
    };
  }

  return { ok: false, description: "invalid_response" };
}

function readNumber(value: unknown, key: string): number | undefined {
  if (typeof value !== "object" || value === null) {
    return undefined;
  }
  const field: unknown = Reflect.get(value, key);
  return typeof field === "number" ? field : undefined;
}

function readString(value: unknown, key: string): string | undefined {
  if (typeof value !== "object" || value === null) {
    return undefined;
  }
  const field: unknown = Reflect.get(value, key);
  return typeof field === "string" ? field : undefined;
}
