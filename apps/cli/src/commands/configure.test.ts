import { mkdtemp } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { beforeEach, describe, expect, it, vi } from "vitest";

import { RecapStore } from "../../../../packages/store/src/index";
import { buildActions, handleConfigure } from "./configure";

const chatId = -1001234567890;

let databaseFile: string;

beforeEach(async () => {
  vi.spyOn(console, "log").mockImplementation(() => undefined);
  const cwd = await mkdtemp(path.join(tmpdir(), "chat-recap-configure-"));
  databaseFile = path.join(cwd, "recap.db");
});

describe("configure command", () => {
  it("applies every requested change and persists it", async () => {
    const result = await handleConfigure({ chatId, enable: true, mode: "private", rates: "2", pin: true, databaseFile });

    const expected = {
      chatId,
      enabled: true,
      sendMode: "only_private_subscriptions",
      ratesPerDay: 2,
      pinEnabled: true
    };
    expect(result).toEqual(expected);

    const store = await RecapStore.open({ databaseFile });
    expect(store.findRecapOptions(chatId)).toEqual(expected);
    store.close();
  });

  it("keeps options that were not mentioned", async () => {
    await handleConfigure({ chatId, enable: true, rates: "3", databaseFile });

    const result = await handleConfigure({ chatId, enable: false, databaseFile });

    expect(result).toEqual({ chatId, enabled: false, sendMode: "publicly", ratesPerDay: 3, pinEnabled: false });
  });

  it("rejects unsupported rates before touching the store", async () => {
    await expect(handleConfigure({ chatId, rates: "5", databaseFile })).rejects.toThrow(
      "invalid recap rate 5, expected one of 2, 3, 4"
    );
  });
});

describe("buildActions", () => {
  it("always finishes with a complete action", () => {
    expect(buildActions({ chatId })).toEqual([{ kind: "complete", chatId }]);
    expect(buildActions({ chatId, pin: false, mode: "public" })).toEqual([
      { kind: "assign_mode", chatId, sendMode: "publicly" },
      { kind: "toggle_pin", chatId, pinEnabled: false },
      { kind: "complete", chatId }
    ]);
  });
});
