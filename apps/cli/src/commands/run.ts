import type { RecapRunResult } from "../../../../packages/core/src/index";
import { loadConfig } from "../config";
import { createContainer } from "../container";

export interface CliRunOptions {
  chatId: number;
  databaseFile?: string;
}

/** Runs one recap of the chat immediately, outside the schedule. */
export async function handleRun(options: CliRunOptions): Promise<RecapRunResult> {
  const config = loadConfig(process.env, { databaseFile: options.databaseFile });
  const container = await createContainer(config);

  try {
    const { store, pipeline } = container;
    const result = await pipeline.run({
      chatId: options.chatId,
      options: store.findRecapOptions(options.chatId),
      subscribers: store.findSubscribers(options.chatId),
      trigger: "manual"
    });
    console.log(JSON.stringify(result, null, 2));
    if (result.status === "failed") {
      process.exitCode = 1;
    }
    return result;
  } finally {
    container.close();
  }
}
