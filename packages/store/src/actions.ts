import { ConfigurationError } from "../../toolkit/src/index";
import {
  RECAP_RATES_PER_DAY,
  RECAP_SEND_MODES,
  type RecapOptions,
  type RecapRatesPerDay,
  type RecapSendMode
} from "./types";

export type RecapAction =
  | { kind: "toggle"; chatId: number; enabled: boolean }
  | { kind: "assign_mode"; chatId: number; sendMode: RecapSendMode }
  | { kind: "select_rates"; chatId: number; ratesPerDay: RecapRatesPerDay }
  | { kind: "toggle_pin"; chatId: number; pinEnabled: boolean }
  | { kind: "complete"; chatId: number };

export function defaultRecapOptions(chatId: number): RecapOptions {
  return {
    chatId,
    enabled: false,
    sendMode: "publicly",
    ratesPerDay: 4,
    pinEnabled: false
  };
}

export function applyRecapAction(current: RecapOptions | undefined, action: RecapAction): RecapOptions {
  const base = current ?? defaultRecapOptions(action.chatId);
  if (base.chatId !== action.chatId) {
    throw new ConfigurationError(
      `action for chat ${action.chatId} cannot be applied to the options of chat ${base.chatId}`
    );
  }

  switch (action.kind) {
    case "toggle":
      return { ...base, enabled: action.enabled };
    case "assign_mode":
      return { ...base, sendMode: action.sendMode };
    case "select_rates":
      return { ...base, ratesPerDay: parseRatesPerDay(action.ratesPerDay) };
    case "toggle_pin":
      return { ...base, pinEnabled: action.pinEnabled };
    case "complete":
      return base;
  }
}

export function parseRatesPerDay(value: unknown): RecapRatesPerDay {
  const numeric = typeof value === "string" ? Number.parseInt(value, 10) : value;
  const rate = RECAP_RATES_PER_DAY.find((candidate) => candidate === numeric);
  if (rate === undefined) {
    throw new ConfigurationError(
      `invalid recap rate ${String(value)}, expected one of ${RECAP_RATES_PER_DAY.join(", ")}`
    );
  }
  return rate;
}

export function parseSendMode(value: string): RecapSendMode {
  const normalized = value.trim().toLowerCase();
  if (normalized === "private" || normalized === "only_private_subscriptions") {
    return "only_private_subscriptions";
  }
  if (normalized === "public" || normalized === "publicly") {
    return "publicly";
  }
  throw new ConfigurationError(
    `invalid send mode ${value}, expected one of ${RECAP_SEND_MODES.join(", ")}`
  );
}

/** Number of hours a history window spans for a given recap rate. */
export function resolveWindowHours(ratesPerDay?: number): number {
  switch (ratesPerDay) {
    case 4:
      return 6;
    case 3:
      return 8;
    case 2:
      return 12;
    default:
      return 6;
  }
}
