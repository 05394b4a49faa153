import { ConfigurationError } from "./errors";

export interface RepoId {
  owner: string;
  name: string;
}

export interface AppConfig {
  freshRss: {
    url: string;
    user: string;
    apiKey: string;
    timeoutMs: number;
    maxItems: number;
  };
  llm: {
    apiKey: string;
    model: string;
    maxTokens: number;
    timeoutMs: number;
    maxSummaryChars: number;
  };
  github: {
    token: string;
    repo: RepoId;
    branch: string;
    authorName: string;
    authorEmail: string;
    /** Open a pull request per run instead of pushing to `branch` */
    pullRequests: boolean;
    prBranchPrefix: string;
  };
  blog: {
    workDir: string;
    postsDir: string;
    /** null when OPML export is disabled */
    opmlPath: string | null;
    slugMaxLength: number;
    contentMinChars: number;
  };
}

export type Env = Record<string, string | undefined>;

const REQUIRED_KEYS = [
  "FRESHRSS_URL",
  "FRESHRSS_USER",
  "FRESHRSS_API_KEY",
  "LLM_API_KEY",
  "GITHUB_TOKEN",
  "REPO_NAME",
] as const;

type RequiredKey = (typeof REQUIRED_KEYS)[number];

export const DEFAULT_MODEL = "claude-sonnet-4-5-20250929";

/**
 * Reads and validates configuration once at startup.
 * Throws ConfigurationError listing every missing required key.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const missing = REQUIRED_KEYS.filter((key) => !env[key]?.trim());
  if (missing.length > 0) {
    throw new ConfigurationError(
      `Missing required configuration: ${missing.join(", ")}`
    );
  }
  const required = (key: RequiredKey): string => (env[key] ?? "").trim();

  const config: AppConfig = {
    freshRss: {
      url: required("FRESHRSS_URL"),
      user: required("FRESHRSS_USER"),
      apiKey: required("FRESHRSS_API_KEY"),
      timeoutMs: parsePositiveInt(env.FETCH_TIMEOUT_MS, 15_000),
      maxItems: parsePositiveInt(env.FRESHRSS_MAX_ITEMS, 200),
    },
    llm: {
      apiKey: required("LLM_API_KEY"),
      model: env.LLM_MODEL?.trim() || DEFAULT_MODEL,
      maxTokens: parsePositiveInt(env.LLM_MAX_TOKENS, 600),
      timeoutMs: parsePositiveInt(env.LLM_TIMEOUT_MS, 60_000),
      maxSummaryChars: parsePositiveInt(env.LLM_MAX_SUMMARY_CHARS, 1200),
    },
    github: {
      token: required("GITHUB_TOKEN"),
      repo: parseRepoName(required("REPO_NAME")),
      branch: env.GIT_BRANCH?.trim() || "main",
      authorName: env.GIT_AUTHOR_NAME?.trim() || "favorites-bot",
      authorEmail:
        env.GIT_AUTHOR_EMAIL?.trim() || "favorites-bot@users.noreply.github.com",
      pullRequests: parseFlag(env.GITHUB_PULL_REQUESTS),
      prBranchPrefix: env.PR_BRANCH_PREFIX?.trim() || "sync/",
    },
    blog: {
      workDir: env.WORK_DIR?.trim() || ".cache/blog",
      postsDir: trimSlashes(env.POSTS_DIR?.trim() || "content/posts"),
      // an explicitly empty OPML_PATH turns the export off
      opmlPath:
        env.OPML_PATH === undefined
          ? "static/subscriptions.opml"
          : trimSlashes(env.OPML_PATH.trim()) || null,
      slugMaxLength: parsePositiveInt(env.SLUG_MAX_LENGTH, 80),
      contentMinChars: parsePositiveInt(env.CONTENT_MIN_CHARS, 200),
    },
  };

  return deepFreeze(config);
}

export function parseRepoName(value: string): RepoId {
  const match = value.match(/^([A-Za-z0-9_.-]+)\/([A-Za-z0-9_.-]+?)(?:\.git)?$/);
  if (!match) {
    throw new ConfigurationError(
      `REPO_NAME must be in "owner/name" form, got "${value}"`
    );
  }
  return { owner: match[1], name: match[2] };
}

function parsePositiveInt(value: string | undefined, fallback: number): number {
  if (!value) return fallback;
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) return fallback;
  return Math.floor(parsed);
}

function parseFlag(value: string | undefined): boolean {
  return ["1", "true", "yes", "on"].includes((value ?? "").trim().toLowerCase());
}

function trimSlashes(value: string): string {
  return value.replace(/^\/+|\/+$/g, "");
}

function deepFreeze<T extends object>(obj: T): T {
  for (const value of Object.values(obj)) {
    if (value && typeof value === "object") {
      deepFreeze(value);
    }
  }
  Object.freeze(obj);
  return obj;
}
