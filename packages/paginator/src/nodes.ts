import { HTMLElement, TextNode, parse as parseHtml } from "node-html-parser";

export interface TelegraphElement {
  tag: string;
  attrs?: { href?: string; src?: string };
  children?: TelegraphNode[];
}

export type TelegraphNode = string | TelegraphElement;

export const ALLOWED_TAGS: ReadonlySet<string> = new Set([
  "a",
  "aside",
  "b",
  "blockquote",
  "br",
  "code",
  "em",
  "figcaption",
  "figure",
  "h3",
  "h4",
  "hr",
  "i",
  "iframe",
  "img",
  "li",
  "ol",
  "p",
  "pre",
  "s",
  "strong",
  "u",
  "ul",
  "video"
]);

// <pre> is parsed as markup so code blocks keep their inline tags.
export const PARSE_OPTIONS = { blockTextElements: { script: true, noscript: true, style: true } };

const TAG_ALIASES: Record<string, string> = {
  h1: "h3",
  h2: "h3",
  h5: "h4",
  h6: "h4",
  del: "s",
  strike: "s",
  ins: "u"
};

/**
 * Converts HTML into the Telegraph content format. Tags Telegraph does not
 * accept are unwrapped and only their children are kept.
 */
export function htmlToNodes(html: string): TelegraphNode[] {
  return convertChildren(parseHtml(html, PARSE_OPTIONS));
}

/** UTF-8 byte length of the serialised node tree, as sent to Telegraph. */
export function serializedSize(html: string): number {
  return Buffer.byteLength(JSON.stringify(htmlToNodes(html)), "utf8");
}

function convertChildren(element: HTMLElement): TelegraphNode[] {
  const nodes: TelegraphNode[] = [];
  for (const child of element.childNodes) {
    if (child instanceof TextNode) {
      const text = child.text;
      if (text) {
        nodes.push(text);
      }
    } else if (child instanceof HTMLElement) {
      nodes.push(...convertElement(child));
    }
  }
  return nodes;
}

function convertElement(element: HTMLElement): TelegraphNode[] {
  const rawTag = (element.rawTagName ?? "").toLowerCase();
  const tag = TAG_ALIASES[rawTag] ?? rawTag;
  const children = convertChildren(element);

  if (!ALLOWED_TAGS.has(tag)) {
    return children;
  }

  const node: TelegraphElement = { tag };
  const href = element.getAttribute("href");
  const src = element.getAttribute("src");
  if (href || src) {
    node.attrs = {};
    if (href) {
      node.attrs.href = href;
    }
    if (src) {
      node.attrs.src = src;
    }
  }
  if (children.length) {
    node.children = children;
  }
  return [node];
}
