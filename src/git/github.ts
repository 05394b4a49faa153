import { z } from "zod";
import type { RepoId } from "../config";
import { AuthenticationError, PushError } from "../errors";
import { fetchWithTimeout } from "../http";

const GITHUB_API = "https://api.github.com";

export interface PullRequestRequest {
  /** Branch holding the run's commit */
  head: string;
  /** Branch the pull request targets */
  base: string;
  title: string;
  body: string;
}

export interface PullRequest {
  number: number;
  url: string;
}

export interface PullRequestOpener {
  open(request: PullRequestRequest): Promise<PullRequest>;
}

const pullRequestSchema = z.object({
  number: z.number(),
  html_url: z.string(),
});

/**
 * Opens pull requests through the GitHub REST API.
 */
export class GitHubPullRequests implements PullRequestOpener {
  constructor(
    private readonly repo: RepoId,
    private readonly token: string,
    private readonly timeoutMs: number
  ) {}

  async open(request: PullRequestRequest): Promise<PullRequest> {
    const { owner, name } = this.repo;
    const res = await fetchWithTimeout(
      `${GITHUB_API}/repos/${owner}/${name}/pulls`,
      {
        method: "POST",
        headers: {
          Accept: "application/vnd.github+json",
          Authorization: `Bearer ${this.token}`,
          "Content-Type": "application/json",
          "X-GitHub-Api-Version": "2022-11-28",
        },
        body: JSON.stringify(request),
      },
      this.timeoutMs
    );

    if (res.status === 401) {
      throw new AuthenticationError("github", "GitHub rejected the access token");
    }
    if (!res.ok) {
      throw new PushError(
        `GitHub refused the pull request from ${request.head}: HTTP ${res.status} ${res.text.slice(0, 200)}`
      );
    }

    let json: unknown;
    try {
      json = JSON.parse(res.text);
    } catch (err) {
      throw new PushError("GitHub returned invalid JSON for the new pull request", err);
    }
    const parsed = pullRequestSchema.safeParse(json);
    if (!parsed.success) {
      throw new PushError("GitHub response for the new pull request has an unexpected shape");
    }
    return { number: parsed.data.number, url: parsed.data.html_url };
  }
}
