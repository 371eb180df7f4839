export type RecapSendMode = "publicly" | "only_private_subscriptions";

export const RECAP_SEND_MODES: readonly RecapSendMode[] = ["publicly", "only_private_subscriptions"];

export type RecapRatesPerDay = 2 | 3 | 4;

export const RECAP_RATES_PER_DAY: readonly RecapRatesPerDay[] = [2, 3, 4];

export type ChatType = "private" | "group" | "supergroup" | "channel";

export interface RecapOptions {
  chatId: number;
  enabled: boolean;
  sendMode: RecapSendMode;
  ratesPerDay: RecapRatesPerDay;
  pinEnabled: boolean;
}

export interface Subscriber {
  chatId: number;
  userId: number;
}

export interface ChatHistoryMessage {
  chatId: number;
  messageId: number;
  chatTitle: string;
  fromName: string;
  fromUsername?: string;
  text: string;
  replyToMessageId?: number;
  createdAt: string;
}

export interface HistoryWindow {
  chatId: number;
  chatTitle: string;
  chatType: ChatType;
  hours: number;
  since: string;
  until: string;
  messages: ChatHistoryMessage[];
}

export interface SentMessageRecord {
  chatId: number;
  messageId: number;
  text: string;
  isPinned: boolean;
  sentAt: string;
}

export interface RecapLogRecord {
  logId: string;
  chatId: number;
  summaries: string[];
  condensedSummary?: string;
  pageUrls: string[];
  createdAt: string;
}

export interface DatabaseConfig {
  filename?: string;
}

/** What the scheduler reads before every run. */
export interface RecapSettingsReader {
  hasRecapEnabled(chatId: number): boolean;
  findRecapOptions(chatId: number): RecapOptions | undefined;
  findSubscribers(chatId: number): Subscriber[];
  listEnabledChatIds(): number[];
}

/** What fan-out delivery writes. */
export interface DeliveryStore {
  unsubscribe(chatId: number, userId: number): boolean;
  saveSentMessage(record: SentMessageRecord): SentMessageRecord;
  findLastPinnedMessage(chatId: number): SentMessageRecord | undefined;
  updatePinnedMessage(chatId: number, messageId: number, pinned: boolean): void;
}

/** What the recap pipeline reads and records. */
export interface RecapHistoryStore {
  listChatHistories(chatId: number, since: string, until?: string): ChatHistoryMessage[];
  recordRecapLog(log: RecapLogRecord): RecapLogRecord;
}

export interface RecapStoreInterface extends RecapSettingsReader, DeliveryStore, RecapHistoryStore {
  saveRecapOptions(options: RecapOptions): RecapOptions;
  subscribe(chatId: number, userId: number): Subscriber;
  recordChatHistory(message: ChatHistoryMessage): ChatHistoryMessage;
  findRecapLog(logId: string): RecapLogRecord | undefined;
  close(): void;
}
