import type {
  GitHubAccount,
  GitHubComment,
  GitHubCommit,
  GitHubPullRequest,
  GitHubPullRequestSummary,
  GitHubRateLimitStatus,
  GitHubRepository,
  GitHubReview,
  GitHubTeam,
} from '../../types/github.js';

export interface ListPullRequestsOptions {
  /** Pages stop once every pull request on a page was created before this. */
  since?: Date;
}

/**
 * Everything the metrics engine reads from GitHub. `GitHubAPIClient` is the
 * production implementation; tests plug in an in-process fake.
 */
export interface RemoteSource {
  getOrganization(org: string): Promise<GitHubAccount>;
  getUser(username: string): Promise<GitHubAccount>;
  listOrganizationRepositories(org: string): Promise<GitHubRepository[]>;
  listUserRepositories(username: string): Promise<GitHubRepository[]>;
  listTeams(org: string): Promise<GitHubTeam[]>;
  listTeamMembers(org: string, teamSlug: string): Promise<string[]>;
  listPullRequests(owner: string, repo: string, options?: ListPullRequestsOptions): Promise<GitHubPullRequestSummary[]>;
  getPullRequest(owner: string, repo: string, number: number): Promise<GitHubPullRequest>;
  listReviews(owner: string, repo: string, number: number): Promise<GitHubReview[]>;
  listReviewComments(owner: string, repo: string, number: number): Promise<GitHubComment[]>;
  listIssueComments(owner: string, repo: string, number: number): Promise<GitHubComment[]>;
  listCommits(owner: string, repo: string, number: number): Promise<GitHubCommit[]>;
  getRateLimit(): Promise<GitHubRateLimitStatus>;
  close(): Promise<void>;
}
