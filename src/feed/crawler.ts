import * as cheerio from "cheerio";
import type { AnyNode, Cheerio } from "cheerio";
import { fetchWithTimeout } from "../http";

const STRIP = [
  "script",
  "style",
  "noscript",
  "svg",
  "form",
  "nav",
  "header",
  "footer",
  "aside",
  ".comments",
  "#comments",
  ".post-meta",
  ".share",
  ".newsletter",
  ".related-posts",
  "[role='navigation']",
  "[role='complementary']",
].join(", ");

// Containers static-site generators and blog engines put posts in
const CANDIDATES = [
  ".post-body",
  ".post-content",
  ".entry-content",
  ".markdown-body",
  ".article-content",
  ".prose",
  "article",
  "#content",
  "main",
];

const TEXT_BLOCKS = "p, li, pre, blockquote, h2, h3, h4";

const MIN_BODY_CHARS = 100;

/**
 * Fetches the post page and returns its readable text, or null on any failure.
 */
export async function crawlArticle(url: string, timeoutMs: number): Promise<string | null> {
  try {
    const res = await fetchWithTimeout(url, { headers: { Accept: "text/html" } }, timeoutMs);

    if (!res.ok) {
      console.warn(`[crawler] HTTP ${res.status}: ${url}`);
      return null;
    }

    const text = extractArticleText(res.text);
    if (!text || text.length < MIN_BODY_CHARS) {
      console.warn(`[crawler] too little body text (${text?.length ?? 0} chars): ${url}`);
      return null;
    }
    return text;
  } catch (err) {
    console.warn(`[crawler] crawl failed: ${url}`, err);
    return null;
  }
}

/**
 * Picks the candidate container holding the most block text and joins its
 * blocks with blank lines. Pages without any candidate fall back to every
 * paragraph in the document.
 */
export function extractArticleText(html: string): string | null {
  const $ = cheerio.load(html);
  $(STRIP).remove();

  const blocksOf = (root: Cheerio<AnyNode>): string[] =>
    root
      .find(TEXT_BLOCKS)
      // nested blocks (a p inside a blockquote) are read through their parent
      .filter((_, el) => $(el).parents(TEXT_BLOCKS).length === 0)
      .map((_, el) => $(el).text().replace(/\s+/g, " ").trim())
      .get()
      .filter((t) => t.length > 0);

  let best: string[] = [];
  let bestLength = 0;
  for (const selector of CANDIDATES) {
    $(selector).each((_, el) => {
      const blocks = blocksOf($(el));
      const length = blocks.reduce((sum, b) => sum + b.length, 0);
      if (length > bestLength) {
        best = blocks;
        bestLength = length;
      }
    });
  }

  if (bestLength >= MIN_BODY_CHARS) {
    return best.join("\n\n");
  }

  const paragraphs = blocksOf($.root()).filter((t) => t.length > 30);
  return paragraphs.length > 0 ? paragraphs.join("\n\n") : null;
}
