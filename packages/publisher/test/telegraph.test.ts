import { describe, expect, it, vi } from "vitest";

import { TelegraphHttpClient, pagePathFromUrl } from "../src/telegraph";
import { TransientNetworkError } from "../../toolkit/src/index";

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" }
  });
}

const input = {
  accessToken: "test-token",
  title: "Recap",
  authorName: "Recap Bot",
  content: [{ tag: "p", children: ["Hello"] }]
};

describe("TelegraphHttpClient", () => {
  it("posts createPage requests as JSON", async () => {
    const fetchImpl = vi.fn(async (_url: string | URL | Request, _init?: RequestInit) =>
      jsonResponse({ ok: true, result: { url: "https://telegra.ph/Recap-05-01", path: "Recap-05-01" } })
    );
    const client = new TelegraphHttpClient({ fetchImpl });

    const page = await client.createPage(input);

    expect(page).toEqual({ url: "https://telegra.ph/Recap-05-01", path: "Recap-05-01" });
    const [url, init] = fetchImpl.mock.calls[0];
    expect(url).toBe("https://api.telegra.ph/createPage");
    expect(JSON.parse(String(init?.body))).toEqual({
      access_token: "test-token",
      title: "Recap",
      author_name: "Recap Bot",
      content: [{ tag: "p", children: ["Hello"] }],
      return_content: false
    });
  });

  it("addresses edits by page path", async () => {
    const fetchImpl = vi.fn(async (_url: string | URL | Request, _init?: RequestInit) =>
      jsonResponse({ ok: true, result: { url: "https://telegra.ph/Recap-05-01", path: "Recap-05-01" } })
    );
    const client = new TelegraphHttpClient({ apiUrl: "https://telegraph.test", fetchImpl });

    await client.editPage("Recap-05-01", input);

    expect(fetchImpl.mock.calls[0][0]).toBe("https://telegraph.test/editPage/Recap-05-01");
  });

  it("turns API errors into transient network errors", async () => {
    const fetchImpl = vi.fn(async () => jsonResponse({ ok: false, error: "ACCESS_TOKEN_INVALID" }));
    const client = new TelegraphHttpClient({ fetchImpl });

    const failure = client.createPage(input);

    await expect(failure).rejects.toBeInstanceOf(TransientNetworkError);
    await expect(failure).rejects.toThrow("telegraph createPage failed: ACCESS_TOKEN_INVALID");
  });

  it("reports HTTP failures", async () => {
    const fetchImpl = vi.fn(async () => jsonResponse({}, 502));
    const client = new TelegraphHttpClient({ fetchImpl });

    await expect(client.createPage(input)).rejects.toThrow("telegraph createPage responded with HTTP 502");
  });
});

describe("pagePathFromUrl", () => {
  it("extracts the page path", () => {
    expect(pagePathFromUrl("https://telegra.ph/Recap-05-01")).toBe("Recap-05-01");
    expect(pagePathFromUrl("https://graph.org/Recap-05-02")).toBe("Recap-05-02");
    expect(pagePathFromUrl("Recap-05-03")).toBe("Recap-05-03");
  });
});
