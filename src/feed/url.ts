/**
 * Canonical form of an article URL for deduplication: the fragment is
 * dropped, since two links that differ only by `#anchor` are the same article.
 */
export function normalizeUrl(url: string): string {
  try {
    const parsed = new URL(url.trim());
    parsed.hash = "";
    return parsed.href;
  } catch {
    return url.trim();
  }
}
