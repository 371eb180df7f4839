import { randomUUID } from "node:crypto";

import {
  EmptySummarizationError,
  InsufficientHistoryError,
  TransientNetworkError,
  attempt,
  describeError,
  escapeHtml,
  isRecapError,
  scopedLogger,
  withTimeout,
  type Logger,
  type Sleep
} from "../../toolkit/src/index";
import type { ChatHistoryMessage, HistoryWindow } from "../../store/src/index";
import type { LLMClient } from "./llm";
import {
  CONDENSE_SYSTEM_PROMPT,
  SUMMARIZATION_SYSTEM_PROMPT,
  buildCondensePrompt,
  buildSummarizationPrompt
} from "./prompts";

export * from "./llm";

export interface SummarizerOptions {
  llmClient: LLMClient;
  language?: string;
  minMessages?: number;
  maxAttempts?: number;
  retryDelayMs?: number;
  timeoutMs?: number;
  maxHistoryChars?: number;
  condensedLength?: number;
  maxCondensedLength?: number;
  sleep?: Sleep;
  logger?: Logger;
}

export interface SummarizationResult {
  logId: string;
  summaries: string[];
}

export interface TopicDiscussion {
  point: string;
  keyIds: number[];
}

export interface TopicOutline {
  topicName: string;
  sinceId?: number;
  participants: string[];
  discussion: TopicDiscussion[];
  conclusion?: string;
}

export const MIN_HISTORY_MESSAGES = 6;
const DEFAULT_MAX_ATTEMPTS = 3;
const DEFAULT_RETRY_DELAY_MS = 2000;
const DEFAULT_TIMEOUT_MS = 2 * 60 * 1000;
const DEFAULT_MAX_HISTORY_CHARS = 24_000;
const DEFAULT_CONDENSED_LENGTH = 50;
const DEFAULT_MAX_CONDENSED_LENGTH = 280;

export class RecapSummarizer {
  private readonly options: Required<Omit<SummarizerOptions, "sleep" | "logger">> &
    Pick<SummarizerOptions, "sleep">;

  private readonly log: Required<Logger>;

  constructor(options: SummarizerOptions) {
    this.options = {
      llmClient: options.llmClient,
      language: options.language ?? "English",
      minMessages: options.minMessages ?? MIN_HISTORY_MESSAGES,
      maxAttempts: options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS,
      retryDelayMs: options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS,
      timeoutMs: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
      maxHistoryChars: options.maxHistoryChars ?? DEFAULT_MAX_HISTORY_CHARS,
      condensedLength: options.condensedLength ?? DEFAULT_CONDENSED_LENGTH,
      maxCondensedLength: options.maxCondensedLength ?? DEFAULT_MAX_CONDENSED_LENGTH,
      sleep: options.sleep
    };
    this.log = scopedLogger("summarizer", options.logger);
  }

  get model(): string {
    return this.options.llmClient.model;
  }

  async summarize(window: HistoryWindow): Promise<SummarizationResult> {
    if (window.messages.length < this.options.minMessages) {
      throw new InsufficientHistoryError(window.messages.length, this.options.minMessages);
    }

    const history = formatHistory(window.messages, this.options.maxHistoryChars);
    const prompt = {
      system: SUMMARIZATION_SYSTEM_PROMPT,
      user: buildSummarizationPrompt(history, this.options.language)
    };
    const topics = await this.request("summarize", prompt, parseTopics);

    const summaries = topics
      .map((topic) => renderTopic(topic, window))
      .filter((summary) => summary.trim() !== "");
    if (!summaries.length) {
      throw new EmptySummarizationError();
    }

    const logId = randomUUID();
    this.log.info(
      `summarized ${window.messages.length} messages of chat ${window.chatId} into ${summaries.length} topics (log ${logId})`
    );
    return { logId, summaries };
  }

  /**
   * One-line highlight of the window. Falls back to the first summary, or to
   * a placeholder naming the window, when the model fails or answers empty.
   */
  async condense(window: HistoryWindow, summaries: string[]): Promise<string> {
    try {
      const history = formatHistory(window.messages, this.options.maxHistoryChars);
      const prompt = { system: CONDENSE_SYSTEM_PROMPT, user: buildCondensePrompt(history, this.options.language) };
      const condensed = await this.request("condense", prompt, normaliseCondensed);
      if (condensed) {
        return truncateCharacters(condensed, this.options.maxCondensedLength);
      }
      this.log.warn(`condensed summary for chat ${window.chatId} came back empty, using fallback`);
    } catch (error) {
      this.log.warn(`condensing chat ${window.chatId} failed, using fallback: ${describeError(error)}`);
    }
    return fallbackCondensed(window, summaries, this.options.condensedLength);
  }

  private async request<T>(
    label: string,
    prompt: { system: string; user: string },
    parse: (raw: string) => T
  ): Promise<T> {
    const { llmClient, maxAttempts, retryDelayMs, timeoutMs, sleep } = this.options;
    try {
      return await attempt(
        maxAttempts,
        async () => {
          const raw = await withTimeout(timeoutMs, (signal) => llmClient.complete({ ...prompt, signal }));
          return parse(raw);
        },
        {
          delayMs: retryDelayMs,
          sleep,
          onError: (error, attemptNumber) =>
            this.log.warn(`${label} attempt ${attemptNumber}/${maxAttempts} failed: ${describeError(error)}`)
        }
      );
    } catch (error) {
      const cause = isRecapError(error, "retry_exhausted") ? error.cause : error;
      throw new TransientNetworkError(`${label} failed after ${maxAttempts} attempts: ${describeError(cause)}`, {
        cause
      });
    }
  }
}

/**
 * Renders messages one per line, keeping the most recent ones that fit in
 * `maxChars`.
 */
export function formatHistory(messages: ChatHistoryMessage[], maxChars = DEFAULT_MAX_HISTORY_CHARS): string {
  const lines: string[] = [];
  let used = 0;
  for (let index = messages.length - 1; index >= 0; index -= 1) {
    const line = formatHistoryLine(messages[index]);
    if (used + line.length + 1 > maxChars && lines.length) {
      break;
    }
    lines.unshift(line);
    used += line.length + 1;
  }
  return lines.join("\n");
}

function formatHistoryLine(message: ChatHistoryMessage): string {
  const author = message.fromUsername ? `${message.fromName} (@${message.fromUsername})` : message.fromName;
  const reply = message.replyToMessageId ? ` replying to msgId=${message.replyToMessageId}` : "";
  const text = message.text.replace(/\s+/g, " ").trim();
  return `msgId=${message.messageId}: ${author}${reply}: ${text}`;
}

export function parseTopics(raw: string): TopicOutline[] {
  const data: unknown = JSON.parse(stripCodeFence(raw));
  if (!Array.isArray(data)) {
    throw new Error("language model response must be an array of topics");
  }
  return data.map((entry, index) => normaliseTopic(entry, index));
}

function normaliseTopic(value: unknown, index: number): TopicOutline {
  if (typeof value !== "object" || value === null) {
    throw new Error(`topic at index ${index} is not an object`);
  }

  const record = value as Record<string, unknown>;
  const discussion = Array.isArray(record.discussion)
    ? record.discussion.flatMap((entry): TopicDiscussion[] => {
        if (typeof entry !== "object" || entry === null || !("point" in entry) || typeof entry.point !== "string") {
          return [];
        }
        const keyIds = "keyIds" in entry && Array.isArray(entry.keyIds)
          ? entry.keyIds.filter((id: unknown): id is number => typeof id === "number")
          : [];
        return [{ point: entry.point, keyIds }];
      })
    : [];

  return {
    topicName: typeof record.topicName === "string" ? record.topicName : "",
    sinceId: typeof record.sinceId === "number" ? record.sinceId : undefined,
    participants: Array.isArray(record.participants)
      ? record.participants.filter((name): name is string => typeof name === "string")
      : [],
    discussion,
    conclusion: typeof record.conclusion === "string" ? record.conclusion : undefined
  };
}

function stripCodeFence(raw: string): string {
  const trimmed = raw.trim();
  const fenced = /^```(?:json)?\s*([\s\S]*?)\s*```$/.exec(trimmed);
  return fenced ? fenced[1] : trimmed;
}

/**
 * Telegram HTML for one topic. Message references become links only in
 * supergroups, the only chats with public message URLs.
 */
export function renderTopic(topic: TopicOutline, window: Pick<HistoryWindow, "chatId" | "chatType">): string {
  const points = topic.discussion.filter((entry) => entry.point.trim());
  if (!topic.topicName.trim() && !points.length) {
    return "";
  }

  const link = (messageId: number) => messageLink(window.chatId, messageId, window.chatType);
  const heading = escapeHtml(topic.topicName.trim() || "Untitled topic");
  const headingLink = topic.sinceId !== undefined ? link(topic.sinceId) : undefined;
  const lines = [headingLink ? `<b>## <a href="${headingLink}">${heading}</a></b>` : `<b>## ${heading}</b>`];

  if (topic.participants.length) {
    lines.push(`Participants: ${escapeHtml(topic.participants.join(", "))}`);
  }
  if (points.length) {
    lines.push("Discussion:");
    for (const entry of points) {
      const references = entry.keyIds
        .map((id, index) => {
          const href = link(id);
          return href ? `<a href="${href}">[${index + 1}]</a>` : "";
        })
        .filter(Boolean);
      const suffix = references.length ? ` ${references.join(" ")}` : "";
      lines.push(` - ${escapeHtml(entry.point.trim())}${suffix}`);
    }
  }
  if (topic.conclusion?.trim()) {
    lines.push(`Conclusion: ${escapeHtml(topic.conclusion.trim())}`);
  }

  return lines.join("\n");
}

export function messageLink(chatId: number, messageId: number, chatType: HistoryWindow["chatType"]): string | undefined {
  if (chatType !== "supergroup") {
    return undefined;
  }
  const id = String(chatId);
  const internalId = id.startsWith("-100") ? id.slice(4) : id.replace(/^-/, "");
  return `https://t.me/c/${internalId}/${messageId}`;
}

function normaliseCondensed(raw: string): string {
  const line = raw
    .split(/\r?\n/)
    .map((entry) => entry.trim())
    .find(Boolean);
  return (line ?? "").replace(/^["'“]+|["'”]+$/g, "").trim();
}

export function fallbackCondensed(
  window: Pick<HistoryWindow, "hours">,
  summaries: string[],
  maxLength = DEFAULT_CONDENSED_LENGTH
): string {
  const first = summaries.find((summary) => summary.trim());
  if (!first) {
    return `Recap of the past ${window.hours} hours`;
  }
  const plain = decodeBasicEntities(first.replace(/<[^>]+>/g, ""))
    .replace(/^#+\s*/, "")
    .replace(/\s+/g, " ")
    .trim();
  return truncateCharacters(plain, maxLength);
}

function truncateCharacters(text: string, maxLength: number): string {
  const characters = Array.from(text);
  return characters.length > maxLength ? `${characters.slice(0, maxLength).join("")}...` : text;
}

function decodeBasicEntities(value: string): string {
  return value
    .replace(/&lt;/g, "<")
    .replace(/&gt;/g, ">")
    .replace(/&quot;/g, '"')
    .replace(/&amp;/g, "&");
}
