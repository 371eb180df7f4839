import { RecapDatabase } from "./database";
import { applyRecapAction, resolveWindowHours, type RecapAction } from "./actions";
import type {
  ChatHistoryMessage,
  ChatType,
  HistoryWindow,
  RecapLogRecord,
  RecapOptions,
  RecapStoreInterface,
  SentMessageRecord,
  Subscriber
} from "./types";

export * from "./types";
export * from "./actions";
export { parseMessageLines, parseTelegramMessage } from "./parsers";

export interface RecapStoreOptions {
  databaseFile?: string;
}

const HOUR_MS = 60 * 60 * 1000;

export class RecapStore implements RecapStoreInterface {
  private database: RecapDatabase;

  constructor(database: RecapDatabase) {
    this.database = database;
  }

  static async open(options: RecapStoreOptions = {}): Promise<RecapStore> {
    return new RecapStore(await RecapDatabase.open({ filename: options.databaseFile }));
  }

  hasRecapEnabled(chatId: number): boolean {
    return this.database.findRecapOptions(chatId)?.enabled ?? false;
  }

  findRecapOptions(chatId: number): RecapOptions | undefined {
    return this.database.findRecapOptions(chatId);
  }

  saveRecapOptions(options: RecapOptions): RecapOptions {
    return this.database.upsertRecapOptions(options);
  }

  applyAction(action: RecapAction): RecapOptions {
    const next = applyRecapAction(this.database.findRecapOptions(action.chatId), action);
    return this.database.upsertRecapOptions(next);
  }

  listEnabledChatIds(): number[] {
    return this.database.listEnabledChatIds();
  }

  findSubscribers(chatId: number): Subscriber[] {
    return this.database.listSubscribers(chatId);
  }

  subscribe(chatId: number, userId: number): Subscriber {
    return this.database.insertSubscriber(chatId, userId);
  }

  unsubscribe(chatId: number, userId: number): boolean {
    return this.database.deleteSubscriber(chatId, userId);
  }

  recordChatHistory(message: ChatHistoryMessage): ChatHistoryMessage {
    return this.database.insertChatHistory(message);
  }

  listChatHistories(chatId: number, since: string, until?: string): ChatHistoryMessage[] {
    return this.database.listChatHistories(chatId, since, until);
  }

  saveSentMessage(record: SentMessageRecord): SentMessageRecord {
    return this.database.insertSentMessage(record);
  }

  findLastPinnedMessage(chatId: number): SentMessageRecord | undefined {
    return this.database.findLastPinnedMessage(chatId);
  }

  updatePinnedMessage(chatId: number, messageId: number, pinned: boolean): void {
    this.database.setPinned(chatId, messageId, pinned);
  }

  countPinnedMessages(chatId: number): number {
    return this.database.countPinnedMessages(chatId);
  }

  recordRecapLog(log: RecapLogRecord): RecapLogRecord {
    return this.database.insertRecapLog(log);
  }

  findRecapLog(logId: string): RecapLogRecord | undefined {
    return this.database.findRecapLog(logId);
  }

  close(): void {
    this.database.close();
  }
}

export interface HistoryWindowRequest {
  chatId: number;
  chatTitle?: string;
  chatType: ChatType;
  ratesPerDay?: number;
  now?: Date;
}

/**
 * Reads the messages of the window that ends at `now` and spans the hours
 * implied by the chat's recap rate.
 */
export function loadHistoryWindow(
  store: Pick<RecapStoreInterface, "listChatHistories">,
  request: HistoryWindowRequest
): HistoryWindow {
  const hours = resolveWindowHours(request.ratesPerDay);
  const until = request.now ?? new Date();
  const since = new Date(until.getTime() - hours * HOUR_MS);
  const messages = store.listChatHistories(request.chatId, since.toISOString(), until.toISOString());
  const latestTitle = messages.length ? messages[messages.length - 1].chatTitle : "";

  return {
    chatId: request.chatId,
    chatTitle: request.chatTitle || latestTitle,
    chatType: request.chatType,
    hours,
    since: since.toISOString(),
    until: until.toISOString(),
    messages
  };
}
