/**
 * Unit tests for the FreshRSS Google Reader API client.
 * fetch is stubbed; no request leaves the process.
 */

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  FreshRssClient,
  parseClientLogin,
  resolveApiBase,
  type FreshRssConfig,
} from "../../src/feed";
import { AuthenticationError, NetworkError, ParseError, TimeoutError } from "../../src/errors";

const API = "https://rss.example.com/api/greader.php";

const config: FreshRssConfig = {
  url: "https://rss.example.com/",
  user: "alice",
  apiKey: "test-api-password",
  timeoutMs: 1000,
  maxItems: 200,
};

type FetchArgs = [url: string, init?: RequestInit];
const fetchMock = vi.fn<(...args: FetchArgs) => Promise<Response>>();

function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

function loginOk(): Response {
  return new Response("SID=unused\nLSID=unused\nAuth=test-auth\n", { status: 200 });
}

const starred = "user/-/state/com.google/starred";

function item(overrides: Record<string, unknown> = {}) {
  return {
    id: "tag:google.com,2005:reader/item/0000000000000001",
    title: "Hello World",
    published: 1700000000,
    timestampUsec: "1700000100000000",
    canonical: [{ href: "https://x.com/1" }],
    alternate: [{ href: "https://x.com/1", type: "text/html" }],
    summary: { content: "<p>Excerpt</p>" },
    categories: ["user/-/state/com.google/reading-list", starred],
    origin: { streamId: "feed/1", title: "X Blog", htmlUrl: "https://x.com" },
    ...overrides,
  };
}

beforeEach(() => {
  fetchMock.mockReset();
  vi.stubGlobal("fetch", fetchMock);
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "warn").mockImplementation(() => {});
});

afterEach(() => {
  vi.unstubAllGlobals();
  vi.restoreAllMocks();
});

describe("resolveApiBase", () => {
  it("appends the greader endpoint to a root URL", () => {
    expect(resolveApiBase("https://rss.example.com/")).toBe(API);
  });

  it("accepts the /api path", () => {
    expect(resolveApiBase("https://rss.example.com/api")).toBe(API);
  });

  it("keeps an explicit greader.php endpoint", () => {
    expect(resolveApiBase(`${API}/`)).toBe(API);
  });
});

describe("parseClientLogin", () => {
  it("extracts the Auth line", () => {
    expect(parseClientLogin("SID=a\r\nLSID=b\r\nAuth=alice/abc123\r\n")).toBe("alice/abc123");
  });

  it("returns null without an Auth line", () => {
    expect(parseClientLogin("Error=BadAuthentication")).toBeNull();
  });
});

describe("FreshRssClient.fetchFavorites", () => {
  it("logs in and maps starred items", async () => {
    fetchMock
      .mockResolvedValueOnce(loginOk())
      .mockResolvedValueOnce(json({ items: [item()] }));

    const favorites = await new FreshRssClient(config).fetchFavorites();

    expect(favorites).toEqual([
      {
        id: "tag:google.com,2005:reader/item/0000000000000001",
        title: "Hello World",
        url: "https://x.com/1",
        contentOrExcerpt: "<p>Excerpt</p>",
        favoritedAt: new Date(1700000100000),
        publishedAt: new Date(1700000000000),
        feedTitle: "X Blog",
      },
    ]);

    const [loginUrl, loginInit] = fetchMock.mock.calls[0];
    expect(loginUrl).toBe(`${API}/accounts/ClientLogin`);
    expect(loginInit?.method).toBe("POST");
    expect(String(loginInit?.body)).toBe("Email=alice&Passwd=test-api-password");

    const [streamUrl, streamInit] = fetchMock.mock.calls[1];
    expect(streamUrl).toBe(
      `${API}/reader/api/0/stream/contents/user/-/state/com.google/starred?output=json&n=100`
    );
    expect(streamInit?.headers).toMatchObject({ Authorization: "GoogleLogin auth=test-auth" });
  });

  it("prefers full content over the summary", async () => {
    fetchMock
      .mockResolvedValueOnce(loginOk())
      .mockResolvedValueOnce(json({ items: [item({ content: { content: "<p>Full text</p>" } })] }));

    const [favorite] = await new FreshRssClient(config).fetchFavorites();
    expect(favorite.contentOrExcerpt).toBe("<p>Full text</p>");
  });

  it("drops items that are not starred or have no link", async () => {
    fetchMock.mockResolvedValueOnce(loginOk()).mockResolvedValueOnce(
      json({
        items: [
          item({ id: "unstarred", categories: ["user/-/state/com.google/reading-list"] }),
          item({ id: "no-link", canonical: [], alternate: [] }),
          item({ id: "other-user", categories: ["user/1234/state/com.google/starred"] }),
        ],
      })
    );

    const favorites = await new FreshRssClient(config).fetchFavorites();
    expect(favorites.map((f) => f.id)).toEqual(["other-user"]);
  });

  it("follows the continuation within one run", async () => {
    fetchMock
      .mockResolvedValueOnce(loginOk())
      .mockResolvedValueOnce(json({ items: [item({ id: "a" })], continuation: "page-2" }))
      .mockResolvedValueOnce(json({ items: [item({ id: "b" })] }));

    const favorites = await new FreshRssClient(config).fetchFavorites();

    expect(favorites.map((f) => f.id)).toEqual(["a", "b"]);
    expect(fetchMock).toHaveBeenCalledTimes(3);
    expect(fetchMock.mock.calls[2][0]).toBe(
      `${API}/reader/api/0/stream/contents/user/-/state/com.google/starred?output=json&n=99&c=page-2`
    );
  });

  it("stops when the server repeats the same continuation", async () => {
    fetchMock
      .mockResolvedValueOnce(loginOk())
      .mockResolvedValueOnce(json({ items: [item({ id: "a" })], continuation: "same" }))
      .mockResolvedValueOnce(json({ items: [item({ id: "b" })], continuation: "same" }));

    const favorites = await new FreshRssClient(config).fetchFavorites();
    expect(favorites.map((f) => f.id)).toEqual(["a", "b"]);
    expect(fetchMock).toHaveBeenCalledTimes(3);
  });

  it("throws AuthenticationError when the login is rejected", async () => {
    fetchMock.mockResolvedValueOnce(new Response("Error=BadAuthentication", { status: 401 }));

    await expect(new FreshRssClient(config).fetchFavorites()).rejects.toBeInstanceOf(
      AuthenticationError
    );
  });

  it("throws ParseError when the login body has no token", async () => {
    fetchMock.mockResolvedValueOnce(new Response("SID=unused\n", { status: 200 }));

    await expect(new FreshRssClient(config).fetchFavorites()).rejects.toBeInstanceOf(ParseError);
  });

  it("throws ParseError on a non-JSON body", async () => {
    fetchMock
      .mockResolvedValueOnce(loginOk())
      .mockResolvedValueOnce(new Response("<html>oops</html>", { status: 200 }));

    await expect(new FreshRssClient(config).fetchFavorites()).rejects.toBeInstanceOf(ParseError);
  });

  it("throws ParseError on an unexpected JSON shape", async () => {
    fetchMock.mockResolvedValueOnce(loginOk()).mockResolvedValueOnce(json({ items: "nope" }));

    await expect(new FreshRssClient(config).fetchFavorites()).rejects.toBeInstanceOf(ParseError);
  });

  it("throws NetworkError when the host is unreachable", async () => {
    fetchMock.mockRejectedValueOnce(new TypeError("fetch failed"));

    await expect(new FreshRssClient(config).fetchFavorites()).rejects.toBeInstanceOf(NetworkError);
  });

  it("throws TimeoutError when the server does not answer in time", async () => {
    fetchMock.mockImplementationOnce(
      (_url, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener("abort", () => reject(new Error("aborted")));
        })
    );

    await expect(
      new FreshRssClient({ ...config, timeoutMs: 5 }).fetchFavorites()
    ).rejects.toBeInstanceOf(TimeoutError);
  });

  it("throws NetworkError on a server error", async () => {
    fetchMock
      .mockResolvedValueOnce(loginOk())
      .mockResolvedValueOnce(new Response("down", { status: 503 }));

    await expect(new FreshRssClient(config).fetchFavorites()).rejects.toThrow(
      "FreshRSS request failed: HTTP 503"
    );
  });
});

describe("FreshRssClient.fetchSubscriptions", () => {
  it("maps subscriptions with their first folder", async () => {
    fetchMock.mockResolvedValueOnce(loginOk()).mockResolvedValueOnce(
      json({
        subscriptions: [
          {
            id: "feed/1",
            title: "A Blog",
            url: "https://a.example/feed",
            htmlUrl: "https://a.example",
            categories: [{ id: "user/-/label/Tech", label: "Tech" }],
          },
          { id: "feed/https://b.example/rss", title: "B", categories: [] },
          { id: "feed/3", title: "No URL" },
        ],
      })
    );

    const subs = await new FreshRssClient(config).fetchSubscriptions();

    expect(subs).toEqual([
      {
        title: "A Blog",
        xmlUrl: "https://a.example/feed",
        htmlUrl: "https://a.example",
        folder: "Tech",
      },
      { title: "B", xmlUrl: "https://b.example/rss" },
    ]);
    expect(fetchMock.mock.calls[1][0]).toBe(`${API}/reader/api/0/subscription/list?output=json`);
  });

  it("logs in only once per client", async () => {
    fetchMock
      .mockResolvedValueOnce(loginOk())
      .mockResolvedValueOnce(json({ items: [] }))
      .mockResolvedValueOnce(json({ subscriptions: [] }));

    const client = new FreshRssClient(config);
    await client.fetchFavorites();
    await client.fetchSubscriptions();

    const loginCalls = fetchMock.mock.calls.filter(([url]) => url.endsWith("/ClientLogin"));
    expect(loginCalls).toHaveLength(1);
  });
});
