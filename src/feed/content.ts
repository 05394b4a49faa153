import * as cheerio from "cheerio";
import { ParseError } from "../errors";
import { crawlArticle } from "./crawler";
import type { FavoriteArticle } from "./types";

export interface ContentOptions {
  /** Below this many characters the article page is crawled instead */
  minChars: number;
  timeoutMs: number;
}

export type ContentLoader = (article: FavoriteArticle) => Promise<string>;

/**
 * Plain text of an HTML fragment, with block elements separated by a space
 * so headings and paragraphs do not run together.
 */
export function htmlToText(html: string): string {
  if (!html.trim()) return "";
  const $ = cheerio.load(html);
  $("script, style, noscript, iframe").remove();
  $("p, div, br, li, h1, h2, h3, h4, h5, h6, blockquote, pre, tr").after(" ");
  return $.root().text().replace(/\s+/g, " ").trim();
}

/**
 * Text to summarize for an article: the feed content when it is long enough,
 * otherwise the crawled page, otherwise whatever excerpt the feed had.
 */
export async function loadArticleContent(
  article: FavoriteArticle,
  options: ContentOptions
): Promise<string> {
  const fromFeed = htmlToText(article.contentOrExcerpt);
  if (fromFeed.length >= options.minChars) {
    return fromFeed;
  }

  const crawled = await crawlArticle(article.url, options.timeoutMs);
  if (crawled && crawled.length > fromFeed.length) {
    return crawled;
  }

  if (!fromFeed) {
    throw new ParseError(`No content to summarize for ${article.url}`);
  }
  console.log(`[feed] using short excerpt (${fromFeed.length} chars): ${article.url}`);
  return fromFeed;
}

export function createContentLoader(options: ContentOptions): ContentLoader {
  return (article) => loadArticleContent(article, options);
}
