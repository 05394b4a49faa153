export { GitPublisher, createGitPublisher, githubRemoteUrl, pullRequestBranch } from "./publisher";
export type {
  Commit,
  ExistingPost,
  GitClient,
  GitFactory,
  GitPublisherOptions,
  PullRequestOptions,
  Publisher,
} from "./publisher";
export { GitHubPullRequests } from "./github";
export type { PullRequest, PullRequestOpener, PullRequestRequest } from "./github";
