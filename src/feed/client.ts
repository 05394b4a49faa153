import type { ZodType, ZodTypeDef } from "zod";
import type { AppConfig } from "../config";
import { AuthenticationError, NetworkError, ParseError } from "../errors";
import { fetchWithTimeout } from "../http";
import {
  streamContentsSchema,
  subscriptionListSchema,
  type ReaderItem,
} from "./schema";
import type {
  FavoriteArticle,
  FavoritesSource,
  FeedSubscription,
  SubscriptionSource,
} from "./types";

const STARRED_STREAM = "user/-/state/com.google/starred";
const STARRED_CATEGORY = /^user\/[^/]+\/state\/com\.google\/starred$/;
const PAGE_SIZE = 100;

export type FreshRssConfig = AppConfig["freshRss"];

/**
 * FreshRSS client over its Google Reader compatible API.
 *
 * Authenticates lazily with ClientLogin and keeps the auth token for the
 * lifetime of the instance (one run).
 */
export class FreshRssClient implements FavoritesSource, SubscriptionSource {
  private readonly apiBase: string;
  private authToken: string | null = null;

  constructor(private readonly config: FreshRssConfig) {
    this.apiBase = resolveApiBase(config.url);
  }

  async fetchFavorites(): Promise<FavoriteArticle[]> {
    const items: ReaderItem[] = [];
    let continuation: string | undefined;

    do {
      const params = new URLSearchParams({
        output: "json",
        n: String(Math.min(PAGE_SIZE, this.config.maxItems - items.length)),
      });
      if (continuation) params.set("c", continuation);

      const page = await this.getJson(
        `/reader/api/0/stream/contents/${STARRED_STREAM}?${params}`,
        streamContentsSchema
      );
      items.push(...page.items);

      // guard against servers that hand back the same cursor forever
      const next = page.continuation;
      continuation = next && next !== continuation && page.items.length > 0 ? next : undefined;
    } while (continuation && items.length < this.config.maxItems);

    const favorites: FavoriteArticle[] = [];
    for (const item of items) {
      if (!isStarred(item)) continue;
      const article = toFavoriteArticle(item);
      if (!article) {
        console.warn(`[feed] skipping starred item without a link: ${item.id}`);
        continue;
      }
      favorites.push(article);
    }

    console.log(`[feed] ${favorites.length} starred item(s) fetched`);
    return favorites;
  }

  async fetchSubscriptions(): Promise<FeedSubscription[]> {
    const list = await this.getJson(
      "/reader/api/0/subscription/list?output=json",
      subscriptionListSchema
    );

    const subscriptions: FeedSubscription[] = [];
    for (const sub of list.subscriptions) {
      const xmlUrl = sub.url || feedUrlFromId(sub.id);
      if (!xmlUrl) continue;
      const folder = sub.categories.find((c) => c.label)?.label;
      subscriptions.push({
        title: sub.title || xmlUrl,
        xmlUrl,
        ...(sub.htmlUrl ? { htmlUrl: sub.htmlUrl } : {}),
        ...(folder ? { folder } : {}),
      });
    }
    return subscriptions;
  }

  private async login(): Promise<string> {
    if (this.authToken) return this.authToken;

    const res = await fetchWithTimeout(
      `${this.apiBase}/accounts/ClientLogin`,
      {
        method: "POST",
        headers: { "Content-Type": "application/x-www-form-urlencoded" },
        body: new URLSearchParams({
          Email: this.config.user,
          Passwd: this.config.apiKey,
        }),
      },
      this.config.timeoutMs
    );

    if (res.status === 401 || res.status === 403) {
      throw new AuthenticationError(
        "freshrss",
        `FreshRSS rejected the credentials for user "${this.config.user}"`
      );
    }
    if (!res.ok) {
      throw new NetworkError(`FreshRSS login failed: HTTP ${res.status}`);
    }

    const token = parseClientLogin(res.text);
    if (!token) {
      throw new ParseError("FreshRSS login response has no Auth token");
    }

    this.authToken = token;
    return token;
  }

  private async getJson<T>(
    path: string,
    schema: ZodType<T, ZodTypeDef, unknown>
  ): Promise<T> {
    const token = await this.login();
    const res = await fetchWithTimeout(
      `${this.apiBase}${path}`,
      { headers: { Authorization: `GoogleLogin auth=${token}` } },
      this.config.timeoutMs
    );

    if (res.status === 401 || res.status === 403) {
      throw new AuthenticationError("freshrss", `FreshRSS denied access to ${path}`);
    }
    if (!res.ok) {
      throw new NetworkError(`FreshRSS request failed: HTTP ${res.status} ${path}`);
    }

    let body: unknown;
    try {
      body = JSON.parse(res.text);
    } catch (err) {
      throw new ParseError(`FreshRSS returned invalid JSON for ${path}`, err);
    }

    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      throw new ParseError(
        `FreshRSS response for ${path} has an unexpected shape: ${parsed.error.message}`
      );
    }
    return parsed.data;
  }
}

/**
 * Accepts either the FreshRSS root URL or the greader.php endpoint itself.
 */
export function resolveApiBase(url: string): string {
  const trimmed = url.trim().replace(/\/+$/, "");
  if (trimmed.endsWith("/greader.php")) return trimmed;
  if (trimmed.endsWith("/api")) return `${trimmed}/greader.php`;
  return `${trimmed}/api/greader.php`;
}

/**
 * ClientLogin answers with `key=value` lines; the token is on the `Auth=` line.
 */
export function parseClientLogin(body: string): string | null {
  for (const line of body.split(/\r?\n/)) {
    const match = line.match(/^Auth=(.+)$/);
    if (match) return match[1].trim();
  }
  return null;
}

function isStarred(item: ReaderItem): boolean {
  return item.categories.some((c) => STARRED_CATEGORY.test(c));
}

export function toFavoriteArticle(item: ReaderItem): FavoriteArticle | null {
  const url = item.canonical?.[0]?.href || item.alternate?.[0]?.href;
  if (!url) return null;

  const publishedAt = toDate(item.published, "s");
  const favoritedAt = toDate(item.timestampUsec, "us") ?? publishedAt ?? new Date();

  return {
    id: item.id,
    title: item.title?.trim() || url,
    url,
    contentOrExcerpt: item.content?.content || item.summary?.content || "",
    favoritedAt,
    publishedAt,
    feedTitle: item.origin?.title?.trim() || null,
  };
}

function toDate(value: string | number | undefined, unit: "s" | "us"): Date | null {
  if (value === undefined || value === "") return null;
  const n = Number(value);
  if (!Number.isFinite(n) || n <= 0) return null;
  return new Date(unit === "s" ? n * 1000 : Math.floor(n / 1000));
}

function feedUrlFromId(id: string): string | null {
  const raw = id.startsWith("feed/") ? id.slice(5) : id;
  return /^https?:\/\//.test(raw) ? raw : null;
}
