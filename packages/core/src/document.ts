import { escapeHtml } from "../../toolkit/src/index";
import type { HistoryWindow } from "../../store/src/index";

export interface RecapDocumentInput {
  window: Pick<HistoryWindow, "since" | "until" | "hours">;
  summaries: string[];
  model: string;
}

export function formatTimestamp(iso: string): string {
  return `${new Date(iso).toISOString().slice(0, 16).replace("T", " ")} UTC`;
}

export function recapTitle(chatTitle: string, until: string): string {
  return `${chatTitle || "Chat"} recap ${formatTimestamp(until)}`;
}

/**
 * Renders topic summaries into the page HTML: a time range header, one
 * section per topic and a model credit.
 */
export function renderRecapDocument(input: RecapDocumentInput): string {
  const { window } = input;
  const header =
    `<p><em>Messages from ${formatTimestamp(window.since)} to ${formatTimestamp(window.until)} ` +
    `(past ${window.hours} hours)</em></p><hr>`;
  const sections = input.summaries.map(renderTopicSection).join("<hr>");
  const footer = `<hr><p><em>Generated by ${escapeHtml(input.model)}</em></p>`;
  return header + sections + footer;
}

// Summaries are Telegram HTML, one element per line.
function renderTopicSection(summary: string): string {
  const blocks: string[] = [];
  let listItems: string[] = [];
  const closeList = () => {
    if (listItems.length) {
      blocks.push(`<ul>${listItems.join("")}</ul>`);
      listItems = [];
    }
  };

  for (const rawLine of summary.split("\n")) {
    const line = rawLine.trim();
    if (!line) {
      closeList();
      continue;
    }
    const heading = /^<b>#+\s*(.*)<\/b>$/.exec(line);
    const item = /^-\s+(.*)$/.exec(line);
    if (heading) {
      closeList();
      blocks.push(`<h3>${heading[1]}</h3>`);
    } else if (item) {
      listItems.push(`<li>${item[1]}</li>`);
    } else {
      closeList();
      blocks.push(`<p>${line}</p>`);
    }
  }
  closeList();

  return blocks.join("");
}
