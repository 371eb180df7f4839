import { readFile } from "node:fs/promises";

import { RecapStore, parseMessageLines } from "../../../../packages/store/src/index";
import { loadConfig } from "../config";

export interface CliIngestOptions {
  file: string;
  databaseFile?: string;
}

export interface IngestResult {
  ingested: number;
  skipped: number;
}

/** Records a JSON-lines export of Telegram messages (or updates) into the history table. */
export async function handleIngest(options: CliIngestOptions): Promise<IngestResult> {
  const config = loadConfig(process.env, { databaseFile: options.databaseFile });
  const content = await readFile(options.file, "utf8");
  const { messages, skipped } = parseMessageLines(content);

  const store = await RecapStore.open({ databaseFile: config.databaseFile });
  try {
    for (const message of messages) {
      store.recordChatHistory(message);
    }
  } finally {
    store.close();
  }

  console.log(`[ingest] recorded ${messages.length} messages from ${options.file} (${skipped} skipped)`);
  return { ingested: messages.length, skipped };
}
