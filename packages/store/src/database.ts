import { existsSync, readFileSync, writeFileSync } from "node:fs";
import initSqlJs, { type Database, type ParamsObject, type SqlJsStatic, type SqlValue } from "sql.js";

import type {
  ChatHistoryMessage,
  DatabaseConfig,
  RecapLogRecord,
  RecapOptions,
  RecapRatesPerDay,
  RecapSendMode,
  SentMessageRecord,
  Subscriber
} from "./types";
import { RECAP_RATES_PER_DAY } from "./types";

type Params = Record<string, SqlValue>;

const MEMORY = ":memory:";

let engine: Promise<SqlJsStatic> | undefined;

function loadEngine(): Promise<SqlJsStatic> {
  engine ??= initSqlJs();
  return engine;
}

/**
 * SQLite through sql.js. The database lives in memory; a file-backed one is
 * loaded on open and written back after every change.
 */
export class RecapDatabase {
  private readonly db: Database;

  private readonly filename?: string;

  private constructor(db: Database, filename?: string) {
    this.db = db;
    this.filename = filename;
    this.initialise();
  }

  static async open(config: DatabaseConfig = {}): Promise<RecapDatabase> {
    const SQL = await loadEngine();
    const filename = config.filename && config.filename !== MEMORY ? config.filename : undefined;
    const data = filename && existsSync(filename) ? readFileSync(filename) : undefined;
    const database = new RecapDatabase(new SQL.Database(data), filename);
    database.persist();
    return database;
  }

  findRecapOptions(chatId: number): RecapOptions | undefined {
    const row = this.get(
      `
        SELECT chat_id as chatId, enabled, send_mode as sendMode,
               rates_per_day as ratesPerDay, pin_enabled as pinEnabled
        FROM recap_options
        WHERE chat_id = @chatId
      `,
      { chatId }
    );
    return row ? toRecapOptions(row) : undefined;
  }

  upsertRecapOptions(options: RecapOptions): RecapOptions {
    this.write(
      `
        INSERT INTO recap_options (chat_id, enabled, send_mode, rates_per_day, pin_enabled, updated_at)
        VALUES (@chatId, @enabled, @sendMode, @ratesPerDay, @pinEnabled, @updatedAt)
        ON CONFLICT(chat_id) DO UPDATE SET
          enabled = excluded.enabled,
          send_mode = excluded.send_mode,
          rates_per_day = excluded.rates_per_day,
          pin_enabled = excluded.pin_enabled,
          updated_at = excluded.updated_at
      `,
      {
        chatId: options.chatId,
        enabled: options.enabled ? 1 : 0,
        sendMode: options.sendMode,
        ratesPerDay: options.ratesPerDay,
        pinEnabled: options.pinEnabled ? 1 : 0,
        updatedAt: new Date().toISOString()
      }
    );
    return { ...options };
  }

  listEnabledChatIds(): number[] {
    return this.all(`SELECT chat_id as chatId FROM recap_options WHERE enabled = 1 ORDER BY chat_id`).map((row) =>
      numberColumn(row, "chatId")
    );
  }

  listSubscribers(chatId: number): Subscriber[] {
    return this.all(
      `
        SELECT chat_id as chatId, user_id as userId
        FROM recap_subscribers
        WHERE chat_id = @chatId
        ORDER BY created_at, user_id
      `,
      { chatId }
    ).map((row) => ({ chatId: numberColumn(row, "chatId"), userId: numberColumn(row, "userId") }));
  }

  insertSubscriber(chatId: number, userId: number): Subscriber {
    this.write(
      `
        INSERT INTO recap_subscribers (chat_id, user_id, created_at)
        VALUES (@chatId, @userId, @createdAt)
        ON CONFLICT(chat_id, user_id) DO NOTHING
      `,
      { chatId, userId, createdAt: new Date().toISOString() }
    );
    return { chatId, userId };
  }

  deleteSubscriber(chatId: number, userId: number): boolean {
    return (
      this.write(`DELETE FROM recap_subscribers WHERE chat_id = @chatId AND user_id = @userId`, { chatId, userId }) > 0
    );
  }

  insertChatHistory(message: ChatHistoryMessage): ChatHistoryMessage {
    const payload = {
      chatId: message.chatId,
      messageId: message.messageId,
      chatTitle: message.chatTitle,
      fromName: message.fromName,
      fromUsername: message.fromUsername ?? null,
      text: message.text,
      replyToMessageId: message.replyToMessageId ?? null,
      createdAt: new Date(message.createdAt).toISOString()
    };

    this.write(
      `
        INSERT INTO chat_histories (chat_id, message_id, chat_title, from_name, from_username, text, reply_to_message_id, created_at)
        VALUES (@chatId, @messageId, @chatTitle, @fromName, @fromUsername, @text, @replyToMessageId, @createdAt)
        ON CONFLICT(chat_id, message_id) DO UPDATE SET
          chat_title = excluded.chat_title,
          from_name = excluded.from_name,
          from_username = excluded.from_username,
          text = excluded.text,
          reply_to_message_id = excluded.reply_to_message_id,
          created_at = excluded.created_at
      `,
      payload
    );

    return {
      ...message,
      fromUsername: message.fromUsername,
      replyToMessageId: message.replyToMessageId,
      createdAt: payload.createdAt
    };
  }

  listChatHistories(chatId: number, since: string, until?: string): ChatHistoryMessage[] {
    const filters = ["chat_id = @chatId", "created_at >= @since"];
    const params: Params = {
      chatId,
      since: new Date(since).toISOString()
    };
    if (until) {
      filters.push("created_at <= @until");
      params.until = new Date(until).toISOString();
    }

    const rows = this.all(
      `
        SELECT chat_id as chatId, message_id as messageId, chat_title as chatTitle,
               from_name as fromName, from_username as fromUsername, text,
               reply_to_message_id as replyToMessageId, created_at as createdAt
        FROM chat_histories
        WHERE ${filters.join(" AND ")}
        ORDER BY created_at ASC, message_id ASC
      `,
      params
    );
    return rows.map(toChatHistoryMessage);
  }

  insertSentMessage(record: SentMessageRecord): SentMessageRecord {
    // A chat never has more than one pinned record.
    this.transaction(() => {
      if (record.isPinned) {
        this.db.run(
          `UPDATE sent_messages SET is_pinned = 0 WHERE chat_id = @chatId AND message_id != @messageId`,
          bindable({ chatId: record.chatId, messageId: record.messageId })
        );
      }
      this.db.run(
        `
          INSERT INTO sent_messages (chat_id, message_id, text, is_pinned, sent_at)
          VALUES (@chatId, @messageId, @text, @isPinned, @sentAt)
          ON CONFLICT(chat_id, message_id) DO UPDATE SET
            text = excluded.text,
            is_pinned = excluded.is_pinned,
            sent_at = excluded.sent_at
        `,
        bindable({
          chatId: record.chatId,
          messageId: record.messageId,
          text: record.text,
          isPinned: record.isPinned ? 1 : 0,
          sentAt: record.sentAt
        })
      );
    });
    return { ...record };
  }

  findLastPinnedMessage(chatId: number): SentMessageRecord | undefined {
    const row = this.get(
      `
        SELECT chat_id as chatId, message_id as messageId, text, is_pinned as isPinned, sent_at as sentAt
        FROM sent_messages
        WHERE chat_id = @chatId AND is_pinned = 1
        ORDER BY sent_at DESC, message_id DESC
        LIMIT 1
      `,
      { chatId }
    );
    return row ? toSentMessage(row) : undefined;
  }

  setPinned(chatId: number, messageId: number, pinned: boolean): void {
    this.write(`UPDATE sent_messages SET is_pinned = @pinned WHERE chat_id = @chatId AND message_id = @messageId`, {
      chatId,
      messageId,
      pinned: pinned ? 1 : 0
    });
  }

  countPinnedMessages(chatId: number): number {
    const row = this.get(`SELECT COUNT(*) as total FROM sent_messages WHERE chat_id = @chatId AND is_pinned = 1`, {
      chatId
    });
    return row ? numberColumn(row, "total") : 0;
  }

  insertRecapLog(log: RecapLogRecord): RecapLogRecord {
    this.write(
      `
        INSERT INTO recap_logs (log_id, chat_id, summaries, condensed_summary, page_urls, created_at)
        VALUES (@logId, @chatId, @summaries, @condensedSummary, @pageUrls, @createdAt)
        ON CONFLICT(log_id) DO UPDATE SET
          summaries = excluded.summaries,
          condensed_summary = excluded.condensed_summary,
          page_urls = excluded.page_urls
      `,
      {
        logId: log.logId,
        chatId: log.chatId,
        summaries: JSON.stringify(log.summaries),
        condensedSummary: log.condensedSummary ?? null,
        pageUrls: JSON.stringify(log.pageUrls),
        createdAt: log.createdAt
      }
    );
    return { ...log };
  }

  findRecapLog(logId: string): RecapLogRecord | undefined {
    const row = this.get(
      `
        SELECT log_id as logId, chat_id as chatId, summaries, condensed_summary as condensedSummary,
               page_urls as pageUrls, created_at as createdAt
        FROM recap_logs
        WHERE log_id = @logId
      `,
      { logId }
    );

    if (!row) {
      return undefined;
    }
    return {
      logId: stringColumn(row, "logId"),
      chatId: numberColumn(row, "chatId"),
      summaries: safeParseStrings(stringColumn(row, "summaries")),
      condensedSummary: optionalStringColumn(row, "condensedSummary"),
      pageUrls: safeParseStrings(stringColumn(row, "pageUrls")),
      createdAt: stringColumn(row, "createdAt")
    };
  }

  close(): void {
    this.persist();
    this.db.close();
  }

  private all(sql: string, params: Params = {}): ParamsObject[] {
    const statement = this.db.prepare(sql);
    try {
      statement.bind(bindable(params));
      const rows: ParamsObject[] = [];
      while (statement.step()) {
        rows.push(statement.getAsObject());
      }
      return rows;
    } finally {
      statement.free();
    }
  }

  private get(sql: string, params: Params = {}): ParamsObject | undefined {
    return this.all(sql, params)[0];
  }

  /** Runs one change and returns the number of rows it touched. */
  private write(sql: string, params: Params): number {
    this.db.run(sql, bindable(params));
    const changes = this.db.getRowsModified();
    this.persist();
    return changes;
  }

  private transaction(fn: () => void): void {
    this.db.run("BEGIN");
    try {
      fn();
      this.db.run("COMMIT");
    } catch (error) {
      this.db.run("ROLLBACK");
      throw error;
    }
    this.persist();
  }

  private persist(): void {
    if (this.filename) {
      writeFileSync(this.filename, this.db.export());
    }
  }

  private initialise() {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS recap_options (
        chat_id INTEGER PRIMARY KEY,
        enabled INTEGER NOT NULL DEFAULT 0,
        send_mode TEXT NOT NULL DEFAULT 'publicly',
        rates_per_day INTEGER NOT NULL DEFAULT 4,
        pin_enabled INTEGER NOT NULL DEFAULT 0,
        updated_at TEXT NOT NULL
      );
    `);

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS recap_subscribers (
        chat_id INTEGER NOT NULL,
        user_id INTEGER NOT NULL,
        created_at TEXT NOT NULL,
        PRIMARY KEY (chat_id, user_id)
      );
    `);

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS chat_histories (
        chat_id INTEGER NOT NULL,
        message_id INTEGER NOT NULL,
        chat_title TEXT NOT NULL,
        from_name TEXT NOT NULL,
        from_username TEXT,
        text TEXT NOT NULL,
        reply_to_message_id INTEGER,
        created_at TEXT NOT NULL,
        PRIMARY KEY (chat_id, message_id)
      );
      CREATE INDEX IF NOT EXISTS chat_histories_chat_created
        ON chat_histories (chat_id, created_at);
    `);

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS sent_messages (
        chat_id INTEGER NOT NULL,
        message_id INTEGER NOT NULL,
        text TEXT NOT NULL,
        is_pinned INTEGER NOT NULL DEFAULT 0,
        sent_at TEXT NOT NULL,
        PRIMARY KEY (chat_id, message_id)
      );
    `);

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS recap_logs (
        log_id TEXT PRIMARY KEY,
        chat_id INTEGER NOT NULL,
        summaries TEXT NOT NULL,
        condensed_summary TEXT,
        page_urls TEXT NOT NULL DEFAULT '[]',
        created_at TEXT NOT NULL
      );
    `);
  }
}

// sql.js binds named parameters by their full name, prefix included.
function bindable(params: Params): ParamsObject {
  return Object.fromEntries(Object.entries(params).map(([name, value]) => [`@${name}`, value]));
}

function numberColumn(row: ParamsObject, column: string): number {
  const value = row[column];
  if (typeof value !== "number") {
    throw new TypeError(`column ${column} is not a number`);
  }
  return value;
}

function stringColumn(row: ParamsObject, column: string): string {
  const value = row[column];
  if (typeof value !== "string") {
    throw new TypeError(`column ${column} is not text`);
  }
  return value;
}

function optionalStringColumn(row: ParamsObject, column: string): string | undefined {
  const value = row[column];
  return typeof value === "string" ? value : undefined;
}

function optionalNumberColumn(row: ParamsObject, column: string): number | undefined {
  const value = row[column];
  return typeof value === "number" ? value : undefined;
}

function toRecapOptions(row: ParamsObject): RecapOptions {
  return {
    chatId: numberColumn(row, "chatId"),
    enabled: numberColumn(row, "enabled") === 1,
    sendMode: toSendMode(stringColumn(row, "sendMode")),
    ratesPerDay: toRatesPerDay(numberColumn(row, "ratesPerDay")),
    pinEnabled: numberColumn(row, "pinEnabled") === 1
  };
}

function toSendMode(value: string): RecapSendMode {
  return value === "only_private_subscriptions" ? value : "publicly";
}

function toRatesPerDay(value: number): RecapRatesPerDay {
  return RECAP_RATES_PER_DAY.find((rate) => rate === value) ?? 4;
}

function toChatHistoryMessage(row: ParamsObject): ChatHistoryMessage {
  return {
    chatId: numberColumn(row, "chatId"),
    messageId: numberColumn(row, "messageId"),
    chatTitle: stringColumn(row, "chatTitle"),
    fromName: stringColumn(row, "fromName"),
    fromUsername: optionalStringColumn(row, "fromUsername"),
    text: stringColumn(row, "text"),
    replyToMessageId: optionalNumberColumn(row, "replyToMessageId"),
    createdAt: stringColumn(row, "createdAt")
  };
}

function toSentMessage(row: ParamsObject): SentMessageRecord {
  return {
    chatId: numberColumn(row, "chatId"),
    messageId: numberColumn(row, "messageId"),
    text: stringColumn(row, "text"),
    isPinned: numberColumn(row, "isPinned") === 1,
    sentAt: stringColumn(row, "sentAt")
  };
}

function safeParseStrings(serialised: string): string[] {
  try {
    const parsed: unknown = JSON.parse(serialised);
    return Array.isArray(parsed)
      ? parsed.filter((entry): entry is string => typeof entry === "string")
      : [];
  } catch (error) {
    return [];
  }
}
