#!/usr/bin/env node
import { Command, InvalidArgumentError } from "commander";

import { describeError } from "../../../packages/toolkit/src/index";
import { handleConfigure } from "./commands/configure";
import { handleIngest } from "./commands/ingest";
import { handleRun } from "./commands/run";
import { handleServe } from "./commands/serve";
import { handleSubscribe, handleUnsubscribe } from "./commands/subscriptions";

function parseId(value: string): number {
  const parsed = Number(value);
  if (!Number.isSafeInteger(parsed)) {
    throw new InvalidArgumentError(`expected an integer id, got ${value}`);
  }
  return parsed;
}

const program = new Command();
program
  .name("chat-recap")
  .description("Scheduled chat recaps published to Telegraph and delivered over Telegram")
  .option("--database <file>", "SQLite database file (overrides RECAP_DATABASE_FILE)");

function databaseFile(): string | undefined {
  const options: { database?: string } = program.opts();
  return options.database;
}

program
  .command("serve")
  .description("Schedule recaps for every enabled chat and run until interrupted")
  .action(async () => {
    await handleServe({ databaseFile: databaseFile() });
  });

program
  .command("run")
  .description("Run one recap of a chat now")
  .argument("<chatId>", "Chat id", parseId)
  .action(async (chatId: number) => {
    await handleRun({ chatId, databaseFile: databaseFile() });
  });

program
  .command("configure")
  .description("Change the recap options of a chat")
  .argument("<chatId>", "Chat id", parseId)
  .option("--enable", "Enable scheduled recaps")
  .option("--no-enable", "Disable scheduled recaps")
  .option("--mode <mode>", "Send mode (public|private)")
  .option("--rates <count>", "Recaps per day (2|3|4)")
  .option("--pin", "Pin the group recap")
  .option("--no-pin", "Do not pin the group recap")
  .action(async (chatId: number, options: { enable?: boolean; mode?: string; rates?: string; pin?: boolean }) => {
    await handleConfigure({ chatId, ...options, databaseFile: databaseFile() });
  });

program
  .command("subscribe")
  .description("Deliver the recaps of a chat to a user privately")
  .argument("<chatId>", "Chat id", parseId)
  .argument("<userId>", "User id", parseId)
  .action(async (chatId: number, userId: number) => {
    await handleSubscribe({ chatId, userId, databaseFile: databaseFile() });
  });

program
  .command("unsubscribe")
  .description("Stop delivering the recaps of a chat to a user")
  .argument("<chatId>", "Chat id", parseId)
  .argument("<userId>", "User id", parseId)
  .action(async (chatId: number, userId: number) => {
    await handleUnsubscribe({ chatId, userId, databaseFile: databaseFile() });
  });

program
  .command("ingest")
  .description("Record a JSON-lines file of Telegram messages into the chat history")
  .argument("<file>", "JSON-lines file with one message or update per line")
  .action(async (file: string) => {
    await handleIngest({ file, databaseFile: databaseFile() });
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(describeError(error));
  process.exitCode = 1;
});
