import { escapeHtml } from "../../toolkit/src/index";
import type { ChatType } from "../../store/src/index";

export const TELEGRAM_MESSAGE_LIMIT = 4096;

// Room kept for the " (i/n)" suffix appended to every batch.
const BATCH_SUFFIX_RESERVE = 12;

export interface RecapMessageInput {
  title: string;
  chatType: ChatType;
  pageUrls: string[];
  condensedSummary: string;
  model: string;
}

export function buildRecapMessage(input: RecapMessageInput): string {
  const [canonical] = input.pageUrls;
  const lines = [
    canonical ? `<b><a href="${escapeHtml(canonical)}">${escapeHtml(input.title)}</a></b>` : `<b>${escapeHtml(input.title)}</b>`
  ];

  if (input.pageUrls.length > 1) {
    const parts = input.pageUrls.map((url, index) => `<a href="${escapeHtml(url)}">Part ${index + 1}</a>`);
    lines.push(`Pages: ${parts.join(" | ")}`);
  }

  lines.push("", "<b>Condensed summary:</b>", escapeHtml(input.condensedSummary));
  lines.push("", "#recap #recap_auto", `<em>Generated by ${escapeHtml(input.model)}</em>`);

  if (input.chatType !== "supergroup") {
    lines.push(
      "",
      "<em>Tip: links to individual messages are only available once this group is upgraded to a supergroup.</em>"
    );
  }

  return lines.join("\n");
}

export function frameForPrivateSubscriber(chatTitle: string, text: string): string {
  return `Hi, this is the scheduled recap of <b>${escapeHtml(chatTitle)}</b>.\n\n${text}`;
}

export function autoUnsubscribeNotice(chatTitle: string): string {
  return (
    `You have been unsubscribed from the scheduled recaps of <b>${escapeHtml(chatTitle)}</b> ` +
    "because you are no longer a member of the group."
  );
}

export function withBatchSuffix(text: string, index: number, total: number): string {
  return total > 1 ? `${text} (${index + 1}/${total})` : text;
}

/** Per-batch length limit that leaves room for private framing and the batch suffix. */
export function batchLimitFor(chatTitle: string, limit = TELEGRAM_MESSAGE_LIMIT): number {
  return limit - frameForPrivateSubscriber(chatTitle, "").length - BATCH_SUFFIX_RESERVE;
}

/**
 * Splits `text` into ordered batches of at most `limit` characters, breaking
 * at line boundaries. Lines longer than the limit are cut between characters,
 * never inside a tag or an entity, and tags still open at a cut are closed
 * and reopened around it.
 */
export function splitMessageIntoBatches(text: string, limit: number): string[] {
  if (limit <= 0) {
    throw new RangeError(`batch limit must be positive, got ${limit}`);
  }
  if (text.length <= limit) {
    return [text];
  }

  const batches: string[] = [];
  let current = "";
  const flush = () => {
    if (current.trim()) {
      batches.push(current);
    }
    current = "";
  };

  for (const line of text.split("\n")) {
    for (const piece of cutLine(line, limit)) {
      const candidate = current ? `${current}\n${piece}` : piece;
      if (candidate.length > limit) {
        flush();
        current = piece;
      } else {
        current = candidate;
      }
    }
  }
  flush();

  return batches;
}

// A whole tag, a whole entity or one code point.
const TOKEN_PATTERN = /<\/?[a-zA-Z][^>]*>|&(?:#\d+|#x[\da-fA-F]+|[a-zA-Z]+);|[\s\S]/gu;

interface OpenTag {
  name: string;
  markup: string;
}

function cutLine(line: string, limit: number): string[] {
  if (line.length <= limit) {
    return [line];
  }

  const pieces: string[] = [];
  const open: OpenTag[] = [];
  const closers = (tags: OpenTag[]) =>
    tags
      .slice()
      .reverse()
      .map((tag) => `</${tag.name}>`)
      .join("");

  let piece = "";
  let hasContent = false;
  for (const token of line.match(TOKEN_PATTERN) ?? []) {
    const tag = /^<(\/?)([a-zA-Z][\w-]*)/.exec(token);
    let after = open;
    if (tag && tag[1]) {
      const index = open.map((entry) => entry.name).lastIndexOf(tag[2].toLowerCase());
      after = index === -1 ? open : open.slice(0, index);
    } else if (tag) {
      after = [...open, { name: tag[2].toLowerCase(), markup: token }];
    }

    if (hasContent && piece.length + token.length + closers(after).length > limit) {
      pieces.push(piece + closers(open));
      piece = open.map((entry) => entry.markup).join("");
      hasContent = false;
    }

    piece += token;
    if (!tag) {
      hasContent = true;
    }
    open.splice(0, open.length, ...after);
  }
  if (hasContent) {
    pieces.push(piece + closers(open));
  }

  return pieces;
}
