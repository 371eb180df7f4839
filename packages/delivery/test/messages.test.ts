import { describe, expect, it } from "vitest";

import {
  TELEGRAM_MESSAGE_LIMIT,
  batchLimitFor,
  buildRecapMessage,
  frameForPrivateSubscriber,
  splitMessageIntoBatches,
  withBatchSuffix
} from "../src/messages";
import { escapeHtml } from "../../toolkit/src/index";

describe("buildRecapMessage", () => {
  it("links the canonical page and credits the model", () => {
    const message = buildRecapMessage({
      title: "Reading Club recap",
      chatType: "supergroup",
      pageUrls: ["https://telegra.ph/Recap-05-01"],
      condensedSummary: "📚 Chapter three <spoilers> everywhere",
      model: "test-model"
    });

    expect(message).toBe(
      [
        '<b><a href="https://telegra.ph/Recap-05-01">Reading Club recap</a></b>',
        "",
        "<b>Condensed summary:</b>",
        "📚 Chapter three &lt;spoilers&gt; everywhere",
        "",
        "#recap #recap_auto",
        "<em>Generated by test-model</em>"
      ].join("\n")
    );
  });

  it("lists every part and adds the supergroup tip for basic groups", () => {
    const message = buildRecapMessage({
      title: "Recap",
      chatType: "group",
      pageUrls: ["https://telegra.ph/a", "https://telegra.ph/b"],
      condensedSummary: "Short",
      model: "test-model"
    });

    const lines = message.split("\n");
    expect(lines[1]).toBe('Pages: <a href="https://telegra.ph/a">Part 1</a> | <a href="https://telegra.ph/b">Part 2</a>');
    expect(lines[lines.length - 1]).toBe(
      "<em>Tip: links to individual messages are only available once this group is upgraded to a supergroup.</em>"
    );
  });
});

describe("splitMessageIntoBatches", () => {
  it("keeps short messages whole", () => {
    expect(splitMessageIntoBatches("hello", 10)).toEqual(["hello"]);
  });

  it("breaks at line boundaries", () => {
    expect(splitMessageIntoBatches("aaaa\nbbbb\ncccc", 9)).toEqual(["aaaa\nbbbb", "cccc"]);
  });

  it("cuts lines longer than the limit", () => {
    expect(splitMessageIntoBatches("x".repeat(12), 5)).toEqual(["xxxxx", "xxxxx", "xx"]);
  });

  it("never cuts inside an entity", () => {
    const limit = batchLimitFor("Reading Club");
    for (const pad of [3, 4, 5, 6]) {
      const text = escapeHtml("x".repeat(pad) + "Tom & Jerry ".repeat(400));

      const batches = splitMessageIntoBatches(text, limit);

      expect(batches).toHaveLength(2);
      expect(batches.join("")).toBe(text);
      for (const batch of batches) {
        expect(batch.length).toBeLessThanOrEqual(limit);
        expect(batch.replace(/&amp;/g, "")).not.toContain("&");
      }
    }
    expect(splitMessageIntoBatches("&amp;".repeat(5), 7)).toEqual(Array(5).fill("&amp;"));
  });

  it("closes and reopens tags around a cut", () => {
    expect(splitMessageIntoBatches(`<b>${"a".repeat(10)}</b>`, 10)).toEqual([
      "<b>aaa</b>",
      "<b>aaa</b>",
      "<b>aaa</b>",
      "<b>a</b>"
    ]);
    expect(splitMessageIntoBatches('<a href="https://telegra.ph/Recap-1">abcdef</a>', 43)).toEqual([
      '<a href="https://telegra.ph/Recap-1">ab</a>',
      '<a href="https://telegra.ph/Recap-1">cd</a>',
      '<a href="https://telegra.ph/Recap-1">ef</a>'
    ]);
  });

  it("leaves room for framing and the batch suffix", () => {
    const limit = batchLimitFor("Reading Club");
    const framed = frameForPrivateSubscriber("Reading Club", withBatchSuffix("x".repeat(limit), 98, 99));

    expect(framed.length).toBeLessThanOrEqual(TELEGRAM_MESSAGE_LIMIT);
  });
});

describe("withBatchSuffix", () => {
  it("numbers batches only when there are several", () => {
    expect(withBatchSuffix("text", 0, 1)).toBe("text");
    expect(withBatchSuffix("text", 1, 3)).toBe("text (2/3)");
  });
});
