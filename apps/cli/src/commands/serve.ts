import { loadConfig } from "../config";
import { createContainer } from "../container";

export interface CliServeOptions {
  databaseFile?: string;
}

/** Schedules every enabled chat and keeps running until SIGINT or SIGTERM. */
export async function handleServe(options: CliServeOptions = {}): Promise<void> {
  const config = loadConfig(process.env, { databaseFile: options.databaseFile });
  const container = await createContainer(config);
  const { scheduler } = container;

  const scheduled = await scheduler.start();
  console.log(`[serve] scheduling recaps, ${scheduled} chats queued`);

  await new Promise<void>((resolve) => {
    process.once("SIGINT", () => resolve());
    process.once("SIGTERM", () => resolve());
  });

  console.log("[serve] shutting down, waiting for running recaps");
  try {
    await scheduler.stop();
  } finally {
    container.close();
  }
}
