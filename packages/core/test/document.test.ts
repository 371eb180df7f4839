import { describe, expect, it } from "vitest";

import { formatTimestamp, recapTitle, renderRecapDocument } from "../src/index";

const window = {
  since: "2024-05-01T06:00:00.000Z",
  until: "2024-05-01T12:00:00.000Z",
  hours: 6
};

const chapterThree = [
  '<b>## <a href="https://t.me/c/1234567890/1">Chapter three</a></b>',
  "Participants: Alice, Bob",
  "Discussion:",
  ' - Plot twist &amp; ending <a href="https://t.me/c/1234567890/2">[1]</a>',
  "Conclusion: Finish by Friday"
].join("\n");

describe("recapTitle", () => {
  it("names the chat and the end of the window", () => {
    expect(formatTimestamp("2024-05-01T12:00:00.000Z")).toBe("2024-05-01 12:00 UTC");
    expect(recapTitle("Reading Club", window.until)).toBe("Reading Club recap 2024-05-01 12:00 UTC");
    expect(recapTitle("", window.until)).toBe("Chat recap 2024-05-01 12:00 UTC");
  });
});

describe("renderRecapDocument", () => {
  it("renders a topic as heading, paragraphs and a point list", () => {
    const html = renderRecapDocument({ window, summaries: [chapterThree], model: "test-model" });

    expect(html).toBe(
      "<p><em>Messages from 2024-05-01 06:00 UTC to 2024-05-01 12:00 UTC (past 6 hours)</em></p><hr>" +
        '<h3><a href="https://t.me/c/1234567890/1">Chapter three</a></h3>' +
        "<p>Participants: Alice, Bob</p>" +
        "<p>Discussion:</p>" +
        '<ul><li>Plot twist &amp; ending <a href="https://t.me/c/1234567890/2">[1]</a></li></ul>' +
        "<p>Conclusion: Finish by Friday</p>" +
        "<hr><p><em>Generated by test-model</em></p>"
    );
  });

  it("separates topics with rules", () => {
    const html = renderRecapDocument({
      window,
      summaries: ["<b>## Books</b>\n - Dune", "<b>## Snacks</b>\nConclusion: Tea"],
      model: "gpt-4o-mini"
    });

    expect(html).toBe(
      "<p><em>Messages from 2024-05-01 06:00 UTC to 2024-05-01 12:00 UTC (past 6 hours)</em></p><hr>" +
        "<h3>Books</h3><ul><li>Dune</li></ul><hr><h3>Snacks</h3><p>Conclusion: Tea</p>" +
        "<hr><p><em>Generated by gpt-4o-mini</em></p>"
    );
  });
});
