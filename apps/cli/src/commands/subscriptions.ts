import { RecapStore } from "../../../../packages/store/src/index";
import { loadConfig } from "../config";

export interface CliSubscriptionOptions {
  chatId: number;
  userId: number;
  databaseFile?: string;
}

export async function handleSubscribe(options: CliSubscriptionOptions): Promise<void> {
  await withStore(options.databaseFile, (store) => {
    store.subscribe(options.chatId, options.userId);
    console.log(`user ${options.userId} subscribed to the recaps of chat ${options.chatId}`);
  });
}

export async function handleUnsubscribe(options: CliSubscriptionOptions): Promise<boolean> {
  return withStore(options.databaseFile, (store) => {
    const removed = store.unsubscribe(options.chatId, options.userId);
    console.log(
      removed
        ? `user ${options.userId} unsubscribed from the recaps of chat ${options.chatId}`
        : `user ${options.userId} was not subscribed to chat ${options.chatId}`
    );
    return removed;
  });
}

async function withStore<T>(databaseFile: string | undefined, fn: (store: RecapStore) => T): Promise<T> {
  const config = loadConfig(process.env, { databaseFile });
  const store = await RecapStore.open({ databaseFile: config.databaseFile });
  try {
    return fn(store);
  } finally {
    store.close();
  }
}
