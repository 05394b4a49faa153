import type { Summarizer } from "./ai";
import { buildPost, slugForArticle, suffixSlug } from "./blog";
import { SyncError, errorMessage, isRunFatal } from "./errors";
import {
  generateOpml,
  normalizeUrl,
  type ContentLoader,
  type FavoriteArticle,
  type FavoritesSource,
  type SubscriptionSource,
} from "./feed";
import type { Commit, Publisher } from "./git";

export type RunPhase = "syncing" | "fetching" | "processing" | "committing" | "pushing" | "done";

export type ArticleState = "published" | "skipped" | "failed";

export interface ArticleOutcome {
  articleId: string;
  title: string;
  slug: string;
  state: ArticleState;
  /** Repository path of the written post */
  path?: string;
  reason?: string;
}

export type RunStatus = "success" | "completed_with_failures" | "failed";

export interface RunReport {
  status: RunStatus;
  outcomes: ArticleOutcome[];
  commit: Commit | null;
  opmlUpdated: boolean;
  failedPhase?: RunPhase;
  error?: unknown;
}

export interface PipelineDeps {
  source: FavoritesSource;
  summarizer: Summarizer;
  publisher: Publisher;
  loadContent: ContentLoader;
  /** When set together with `opmlPath`, the subscription list is exported too */
  subscriptions?: SubscriptionSource;
}

export interface PipelineOptions {
  slugMaxLength: number;
  opmlPath: string | null;
  opmlTitle?: string;
}

/**
 * One sync run: sync working copy → fetch favorites → per article
 * (skip | load → summarize → build → stage) → OPML → commit → push.
 *
 * Per-article errors only fail that article. Run-fatal errors (credentials,
 * repository, push) stop the run; whatever was staged but not committed is
 * discarded. Never throws: the outcome is in the returned report.
 */
export async function runPipeline(
  deps: PipelineDeps,
  options: PipelineOptions
): Promise<RunReport> {
  const { publisher } = deps;
  const outcomes: ArticleOutcome[] = [];
  let commit: Commit | null = null;
  let opmlUpdated = false;
  let phase: RunPhase = "syncing";

  console.log("=== sync started ===");

  try {
    console.log("[pipeline] syncing blog working copy");
    await publisher.sync();

    phase = "fetching";
    const favorites = await deps.source.fetchFavorites();
    console.log(`[pipeline] ${favorites.length} favorite(s) to consider`);

    phase = "processing";
    const seenUrls = new Set<string>();
    const seenSlugs = new Set<string>();

    for (let i = 0; i < favorites.length; i++) {
      const article = favorites[i];
      const outcome = await processArticle(article, deps, options, seenUrls, seenSlugs);
      outcomes.push(outcome);
      logOutcome(outcome, i + 1, favorites.length);
    }

    if (options.opmlPath && deps.subscriptions) {
      opmlUpdated = await exportOpml(deps.subscriptions, publisher, options.opmlPath, options.opmlTitle);
    }

    phase = "committing";
    const published = outcomes.filter((o) => o.state === "published");
    commit = await publisher.commit(buildCommitMessage(published, opmlUpdated));

    if (commit) {
      phase = "pushing";
      await publisher.push(commit);
    } else {
      console.log("[pipeline] nothing new to commit");
    }

    phase = "done";
  } catch (err) {
    console.error(`[pipeline] run failed while ${phase}: ${errorMessage(err)}`);
    if (phase === "processing") {
      await publisher.discard();
    }
    const report: RunReport = {
      status: "failed",
      outcomes,
      commit: phase === "pushing" ? null : commit,
      opmlUpdated,
      failedPhase: phase,
      error: err,
    };
    logSummary(report);
    return report;
  }

  const report: RunReport = {
    status: outcomes.some((o) => o.state === "failed") ? "completed_with_failures" : "success",
    outcomes,
    commit,
    opmlUpdated,
  };
  logSummary(report);
  return report;
}

// Colliding titles get -2 .. -50 before the article is given up on
const MAX_SLUG_SUFFIX = 50;

async function processArticle(
  article: FavoriteArticle,
  deps: PipelineDeps,
  options: PipelineOptions,
  seenUrls: Set<string>,
  seenSlugs: Set<string>
): Promise<ArticleOutcome> {
  const baseSlug = slugForArticle(article, options.slugMaxLength);
  const base = { articleId: article.id, title: article.title, slug: baseSlug };

  const urlKey = normalizeUrl(article.url);
  if (seenUrls.has(urlKey)) {
    return { ...base, state: "skipped", reason: "duplicate source URL in this run" };
  }
  seenUrls.add(urlKey);

  let claimed: string | null = null;
  try {
    const { slug, published } = await resolveSlug(baseSlug, urlKey, deps, options, seenSlugs);
    if (published) {
      return { ...base, slug, state: "skipped", reason: "already published" };
    }
    seenSlugs.add(slug);
    claimed = slug;

    const content = await deps.loadContent(article);
    const summary = await deps.summarizer.summarize({
      articleId: article.id,
      title: article.title,
      url: article.url,
      content,
    });
    const post = buildPost(article, summary, { slugMaxLength: options.slugMaxLength, slug });
    const path = await deps.publisher.stagePost(post);

    return { ...base, slug, state: "published", path };
  } catch (err) {
    if (isRunFatal(err)) throw err;
    // a later favorite with the same title may still take the slug
    if (claimed) seenSlugs.delete(claimed);
    return { ...base, slug: claimed ?? baseSlug, state: "failed", reason: errorMessage(err) };
  }
}

/**
 * First slug for the article that is either free or already holds a post with
 * the same source URL. Slugs taken earlier in this run or by a post of another
 * article are passed over for a suffixed one.
 */
async function resolveSlug(
  baseSlug: string,
  urlKey: string,
  deps: PipelineDeps,
  options: PipelineOptions,
  seenSlugs: Set<string>
): Promise<{ slug: string; published: boolean }> {
  for (let n = 1; n <= MAX_SLUG_SUFFIX; n++) {
    const slug = suffixSlug(baseSlug, n, options.slugMaxLength);
    if (seenSlugs.has(slug)) continue;

    const existing = await deps.publisher.findPost(slug);
    if (!existing) return { slug, published: false };
    if (existing.sourceUrl && normalizeUrl(existing.sourceUrl) === urlKey) {
      return { slug, published: true };
    }
  }
  throw new SyncError(`No free slug left for "${baseSlug}"`);
}

async function exportOpml(
  source: SubscriptionSource,
  publisher: Publisher,
  opmlPath: string,
  title = "Subscriptions"
): Promise<boolean> {
  try {
    const subscriptions = await source.fetchSubscriptions();
    const changed = await publisher.stageFile(opmlPath, generateOpml(subscriptions, { title }));
    console.log(
      `[pipeline] OPML ${changed ? "updated" : "unchanged"} (${subscriptions.length} subscription(s))`
    );
    return changed;
  } catch (err) {
    console.warn(`[pipeline] OPML export skipped: ${errorMessage(err)}`);
    return false;
  }
}

export function buildCommitMessage(published: ArticleOutcome[], opmlUpdated: boolean): string {
  if (published.length === 0) {
    return "Update subscriptions OPML";
  }

  const noun = published.length === 1 ? "summary" : "summaries";
  const lines = [`Add ${published.length} favorite ${noun}`, ""];
  for (const outcome of published) {
    lines.push(`- ${outcome.title.replace(/\s+/g, " ").trim()}`);
  }
  if (opmlUpdated) {
    lines.push("", "Update subscriptions OPML");
  }
  return lines.join("\n");
}

/**
 * 0: everything done. 2: finished, but some articles failed. 1: run aborted.
 */
export function exitCodeFor(report: RunReport): number {
  switch (report.status) {
    case "success":
      return 0;
    case "completed_with_failures":
      return 2;
    case "failed":
      return 1;
  }
}

function logOutcome(outcome: ArticleOutcome, index: number, total: number): void {
  const prefix = `[pipeline] (${index}/${total}) ${outcome.state}: ${outcome.title}`;
  switch (outcome.state) {
    case "published":
      console.log(`${prefix} -> ${outcome.path}`);
      break;
    case "skipped":
      console.log(`${prefix} (${outcome.reason})`);
      break;
    case "failed":
      console.error(`${prefix} (${outcome.reason})`);
      break;
  }
}

function logSummary(report: RunReport): void {
  const count = (state: ArticleState) => report.outcomes.filter((o) => o.state === state).length;
  console.log(
    `[pipeline] run ${report.status}: published ${count("published")}, skipped ${count("skipped")}, failed ${count("failed")}` +
      (report.commit ? `, commit ${report.commit.sha}` : "")
  );
  console.log("=== sync finished ===");
}
