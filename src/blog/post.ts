import path from "path";
import { parseDocument, stringify } from "yaml";
import type { Summary } from "../ai";
import type { FavoriteArticle } from "../feed";
import { DEFAULT_SLUG_MAX_LENGTH, slugify } from "./slug";

export interface BlogPost {
  slug: string;
  title: string;
  sourceUrl: string;
  /** Post date: when the article was starred */
  publishedDate: Date;
  /** The article's own publication date, when the feed knew it */
  articleDate: Date | null;
  summaryBody: string;
  tags: string[];
  feedTitle: string | null;
}

export interface BuildOptions {
  slugMaxLength?: number;
  /** Slug already resolved against existing posts */
  slug?: string;
}

export function cleanTitle(title: string): string {
  return title.replace(/\s+/g, " ").trim();
}

/**
 * The slug an article's post gets. The pipeline checks it for an existing
 * post before spending a summary call.
 */
export function slugForArticle(
  article: Pick<FavoriteArticle, "title" | "url">,
  maxLength = DEFAULT_SLUG_MAX_LENGTH
): string {
  return slugify(cleanTitle(article.title) || article.url, maxLength);
}

/**
 * Combines an article and its summary into a post. Pure.
 */
export function buildPost(
  article: FavoriteArticle,
  summary: Summary,
  options: BuildOptions = {}
): BlogPost {
  const title = cleanTitle(article.title) || article.url;
  return {
    slug: options.slug ?? slugForArticle(article, options.slugMaxLength),
    title,
    sourceUrl: article.url,
    publishedDate: article.favoritedAt,
    articleDate: article.publishedAt,
    summaryBody: summary.text.trim(),
    tags: summary.tags,
    feedTitle: article.feedTitle,
  };
}

/**
 * Hugo page: YAML front matter, then a fixed body template.
 * Values go through the YAML serializer so quotes, colons and leading
 * indicator characters in titles cannot break the header.
 */
export function renderPost(post: BlogPost): string {
  const frontMatter: Record<string, unknown> = {
    title: post.title,
    date: post.publishedDate.toISOString(),
    draft: false,
    source: post.sourceUrl,
    tags: post.tags,
  };
  if (post.feedTitle) {
    frontMatter.feed = post.feedTitle;
  }

  const header = stringify(frontMatter, { lineWidth: 0 });
  const published = formatDay(post.articleDate ?? post.publishedDate);

  return [
    "---",
    header.trimEnd(),
    "---",
    "",
    `> Source: [${escapeLinkText(post.title)}](<${escapeLinkTarget(post.sourceUrl)}>)`,
    `> Published: ${published}`,
    "",
    post.summaryBody,
    "",
  ].join("\n");
}

/**
 * The `source` URL recorded in a post's front matter, or null when the file
 * has no readable front matter or no source.
 */
export function readPostSource(content: string): string | null {
  const match = content.match(/^---\r?\n([\s\S]*?)\r?\n---/);
  if (!match) return null;
  const doc = parseDocument(match[1]);
  if (doc.errors.length > 0) return null;
  const source = doc.get("source");
  return typeof source === "string" ? source : null;
}

export function postPath(postsDir: string, slug: string): string {
  return path.posix.join(postsDir, `${slug}.md`);
}

function formatDay(date: Date): string {
  return date.toISOString().slice(0, 10);
}

function escapeLinkText(text: string): string {
  return text.replace(/([\\[\]])/g, "\\$1");
}

function escapeLinkTarget(url: string): string {
  return url.replace(/ /g, "%20").replace(/</g, "%3C").replace(/>/g, "%3E");
}
