import {
  RecapStore,
  parseRatesPerDay,
  parseSendMode,
  type RecapAction,
  type RecapOptions
} from "../../../../packages/store/src/index";
import { loadConfig } from "../config";

export interface CliConfigureOptions {
  chatId: number;
  enable?: boolean;
  mode?: string;
  rates?: string;
  pin?: boolean;
  databaseFile?: string;
}

/** Applies the requested changes as configuration actions, in a fixed order. */
export async function handleConfigure(options: CliConfigureOptions): Promise<RecapOptions> {
  const config = loadConfig(process.env, { databaseFile: options.databaseFile });
  const actions = buildActions(options);
  const store = await RecapStore.open({ databaseFile: config.databaseFile });

  try {
    let result: RecapOptions | undefined;
    for (const action of actions) {
      result = store.applyAction(action);
    }
    const current = result ?? store.applyAction({ kind: "complete", chatId: options.chatId });
    console.log(JSON.stringify(current, null, 2));
    return current;
  } finally {
    store.close();
  }
}

export function buildActions(options: CliConfigureOptions): RecapAction[] {
  const { chatId } = options;
  const actions: RecapAction[] = [];
  if (options.enable !== undefined) {
    actions.push({ kind: "toggle", chatId, enabled: options.enable });
  }
  if (options.mode !== undefined) {
    actions.push({ kind: "assign_mode", chatId, sendMode: parseSendMode(options.mode) });
  }
  if (options.rates !== undefined) {
    actions.push({ kind: "select_rates", chatId, ratesPerDay: parseRatesPerDay(options.rates) });
  }
  if (options.pin !== undefined) {
    actions.push({ kind: "toggle_pin", chatId, pinEnabled: options.pin });
  }
  actions.push({ kind: "complete", chatId });
  return actions;
}
