import { NetworkError, TimeoutError } from "./errors";

export const USER_AGENT = "favorites-blog-sync/0.1";

export interface RequestOptions {
  method?: "GET" | "POST";
  headers?: Record<string, string>;
  body?: URLSearchParams | string;
}

export interface HttpResponse {
  status: number;
  ok: boolean;
  /** Full response body */
  text: string;
}

/**
 * fetch with an abort timer that covers the headers and the whole body.
 * Connection failures become NetworkError and an expired timer becomes
 * TimeoutError; HTTP status handling is left to callers.
 */
export async function fetchWithTimeout(
  url: string,
  init: RequestOptions,
  timeoutMs: number
): Promise<HttpResponse> {
  const controller = new AbortController();
  let timedOut = false;
  const timer = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, timeoutMs);

  try {
    const res = await fetch(url, {
      method: init.method ?? "GET",
      body: init.body,
      signal: controller.signal,
      headers: {
        "User-Agent": USER_AGENT,
        ...init.headers,
      },
    });
    // a server may send headers and then stall the body
    const text = await res.text();
    return { status: res.status, ok: res.ok, text };
  } catch (err) {
    if (timedOut) {
      throw new TimeoutError(
        `Request timed out after ${timeoutMs}ms: ${stripQuery(url)}`,
        timeoutMs,
        err
      );
    }
    throw new NetworkError(`Request failed: ${stripQuery(url)}`, err);
  } finally {
    clearTimeout(timer);
  }
}

function stripQuery(url: string): string {
  const index = url.indexOf("?");
  return index === -1 ? url : url.slice(0, index);
}
