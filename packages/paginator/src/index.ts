import { HTMLElement, TextNode, parse as parseHtml } from "node-html-parser";

import {
  ConfigurationError,
  PublishingOverBudgetError,
  escapeHtml,
  scopedLogger,
  type Logger
} from "../../toolkit/src/index";
import { PARSE_OPTIONS, htmlToNodes, serializedSize } from "./nodes";

export { ALLOWED_TAGS, htmlToNodes, serializedSize } from "./nodes";
export type { TelegraphElement, TelegraphNode } from "./nodes";

/** Hard ceiling Telegraph enforces on the serialised content of one page. */
export const TELEGRAPH_PAGE_LIMIT = 64 * 1024;
export const DEFAULT_BYTE_BUDGET = 60 * 1024;
export const DEFAULT_SAFETY_BUFFER = 2 * 1024;

export const FIRST_PAGE_NOTICE =
  "<p><strong>Note:</strong> this recap is long and has been split into multiple pages.</p><hr>";
export const CONTINUES_FOOTER =
  "<hr><p><em>(This page is part of a series, continues on the next page.)</em></p>";
export const SERIES_END_FOOTER = "<hr><p><em>(End of series.)</em></p>";

export function continuedHeader(title: string, part: number): string {
  return (
    `<p><strong>${escapeHtml(title)} (continued ${part})</strong></p>` +
    "<p><strong>Note:</strong> this page continues a split recap.</p><hr>"
  );
}

export function buildSeriesIndex(urls: string[]): string {
  const items = urls
    .map((url, index) => `<li><a href="${escapeHtml(url)}">Part ${index + 1}</a></li>`)
    .join("");
  return `<p><strong>Series pages:</strong></p><ul>${items}</ul><hr>`;
}

export interface PaginateOptions {
  byteBudget?: number;
  safetyBuffer?: number;
  logger?: Logger;
}

interface Fragment {
  html: string;
  bytes: number;
  count: number;
}

interface Block extends Fragment {
  tag: string;
  text: string;
  element?: HTMLElement;
}

// Part numbers are rendered into continuation headers; this bounds their width.
const WIDEST_PART_NUMBER = 99999;

const TEXT_BLOCK_TAGS: ReadonlySet<string> = new Set(["p", "pre", "blockquote", "aside", "h3", "h4"]);

const LIST_TAGS: ReadonlySet<string> = new Set(["ul", "ol"]);

/**
 * Splits `html` into pages whose serialised node tree stays within
 * `byteBudget - safetyBuffer` bytes. A document that already fits is
 * returned untouched as the only page.
 */
export function paginate(html: string, title: string, options: PaginateOptions = {}): string[] {
  const byteBudget = options.byteBudget ?? DEFAULT_BYTE_BUDGET;
  const safetyBuffer = options.safetyBuffer ?? DEFAULT_SAFETY_BUFFER;
  const limit = byteBudget - safetyBuffer;
  const log = scopedLogger("paginator", options.logger);

  if (limit <= 0) {
    throw new ConfigurationError(
      `byte budget ${byteBudget} leaves no room after the ${safetyBuffer} byte safety buffer`
    );
  }

  const totalBytes = serializedSize(html);
  if (totalBytes <= limit) {
    return [html];
  }

  const footer = widest([toFragment(CONTINUES_FOOTER), toFragment(SERIES_END_FOOTER)]);
  const widestHeader = widest([
    toFragment(FIRST_PAGE_NOTICE),
    toFragment(continuedHeader(title, WIDEST_PART_NUMBER))
  ]);
  const headerFor = (pageIndex: number) =>
    toFragment(pageIndex === 0 ? FIRST_PAGE_NOTICE : continuedHeader(title, pageIndex + 1));

  const blocks: Block[] = [];
  for (const block of splitBlocks(html)) {
    if (combinedSize([widestHeader, block, footer]) <= limit) {
      blocks.push(block);
      continue;
    }
    const overflow = new PublishingOverBudgetError(block.bytes, limit);
    const capacity = limit - combinedSize([widestHeader, footer]) - 1;
    if (block.element && LIST_TAGS.has(block.tag)) {
      log.warn(`${overflow.message}; splitting its <${block.tag}> items across pages`);
      blocks.push(...splitList(block.element, block.tag, capacity, overflow));
      continue;
    }
    log.warn(`${overflow.message}; splitting its <${block.tag}> text into chunks`);
    blocks.push(...hardSplit(block, capacity, overflow));
  }

  const pages: Fragment[][] = [];
  let current: Fragment[] = [];
  for (const block of blocks) {
    if (current.length && combinedSize([headerFor(pages.length), ...current, block, footer]) > limit) {
      pages.push(current);
      current = [];
    }
    current.push(block);
  }
  if (current.length) {
    pages.push(current);
  }

  log.info(`split ${totalBytes} bytes of "${title}" into ${pages.length} pages (limit ${limit})`);

  return pages.map((page, index) => {
    const closing = index === pages.length - 1 ? SERIES_END_FOOTER : CONTINUES_FOOTER;
    return headerFor(index).html + page.map((fragment) => fragment.html).join("") + closing;
  });
}

function splitBlocks(html: string): Block[] {
  const blocks: Block[] = [];
  for (const child of parseHtml(html, PARSE_OPTIONS).childNodes) {
    if (child instanceof HTMLElement) {
      const tag = (child.rawTagName ?? "").toLowerCase();
      blocks.push({ ...toFragment(child.toString()), tag, text: child.text, element: child });
    } else if (child instanceof TextNode && child.rawText.trim()) {
      blocks.push({ ...toFragment(`<p>${child.rawText.trim()}</p>`), tag: "p", text: child.text.trim() });
    }
  }
  return blocks;
}

/**
 * Regroups the items of an oversized list into consecutive lists of the same
 * tag that each fit `capacity` bytes. An item too large on its own is cut
 * into text chunks.
 */
function splitList(element: HTMLElement, tag: string, capacity: number, overflow: PublishingOverBudgetError): Block[] {
  const wrapperBytes = Buffer.byteLength(JSON.stringify({ tag, children: [] }), "utf8") - 2;
  const blocks: Block[] = [];
  let items: Fragment[] = [];
  let texts: string[] = [];

  const wrap = (fragments: Fragment[], text: string): Block => ({
    ...toFragment(`<${tag}>${fragments.map((fragment) => fragment.html).join("")}</${tag}>`),
    tag,
    text
  });
  const flush = () => {
    if (items.length) {
      blocks.push(wrap(items, texts.join("")));
    }
    items = [];
    texts = [];
  };

  for (const child of element.childNodes) {
    let item: Fragment;
    let text: string;
    if (child instanceof HTMLElement) {
      item = toFragment(child.toString());
      text = child.text;
    } else if (child instanceof TextNode && child.rawText.trim()) {
      item = toFragment(child.rawText);
      text = child.text;
    } else {
      continue;
    }

    if (wrapperBytes + combinedSize([item]) > capacity) {
      flush();
      blocks.push(...hardSplit(wrap([item], text), capacity, overflow));
      continue;
    }
    if (items.length && wrapperBytes + combinedSize([...items, item]) > capacity) {
      flush();
    }
    items.push(item);
    texts.push(text);
  }
  flush();

  return blocks;
}

/**
 * Cuts the text of an oversized block into consecutive chunks that each fit
 * `capacity` bytes once wrapped in the block's tag. Inline markup inside the
 * block is flattened to text.
 */
function hardSplit(block: Block, capacity: number, overflow: PublishingOverBudgetError): Block[] {
  const tag = TEXT_BLOCK_TAGS.has(block.tag) ? block.tag : "p";
  const wrapperBytes = Buffer.byteLength(JSON.stringify({ tag, children: [""] }), "utf8");
  const available = capacity - wrapperBytes;
  const characters = Array.from(block.text);

  if (!block.text.trim() || available <= 0) {
    throw overflow;
  }

  const chunks: Block[] = [];
  let chunk = "";
  let chunkBytes = 0;
  const flush = () => {
    if (chunk) {
      chunks.push({ ...toFragment(`<${tag}>${escapeHtml(chunk)}</${tag}>`), tag, text: chunk });
    }
    chunk = "";
    chunkBytes = 0;
  };

  for (const character of characters) {
    const cost = Buffer.byteLength(JSON.stringify(character), "utf8") - 2;
    if (chunkBytes + cost > available) {
      flush();
    }
    chunk += character;
    chunkBytes += cost;
  }
  flush();

  return chunks;
}

function toFragment(html: string): Fragment {
  const nodes = htmlToNodes(html);
  return {
    html,
    bytes: Buffer.byteLength(JSON.stringify(nodes), "utf8") - 2,
    count: nodes.length
  };
}

// Serialised size of the node array made of every fragment's nodes.
function combinedSize(fragments: Fragment[]): number {
  const filled = fragments.filter((fragment) => fragment.count > 0);
  if (!filled.length) {
    return 2;
  }
  return 2 + filled.reduce((total, fragment) => total + fragment.bytes, 0) + filled.length - 1;
}

function widest(fragments: Fragment[]): Fragment {
  return fragments.reduce((best, fragment) => (fragment.bytes > best.bytes ? fragment : best));
}
