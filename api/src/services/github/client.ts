import { Octokit } from '@octokit/rest';
import { Agent, fetch as undiciFetch, type RequestInfo, type RequestInit } from 'undici';
import {
  GitHubAccount,
  GitHubComment,
  GitHubCommit,
  GitHubPullRequest,
  GitHubPullRequestSummary,
  GitHubRateLimitStatus,
  GitHubRepository,
  GitHubReview,
  GitHubReviewState,
  GitHubTeam,
  GitHubAPIError,
  GitHubAuthError,
  GitHubRateLimitError,
} from '../../types/github.js';
import type { ListPullRequestsOptions, RemoteSource } from './source.js';

export interface GitHubClientOptions {
  /** Per-request timeout; a hung call fails instead of holding a slot forever. */
  requestTimeoutMs?: number;
  baseUrl?: string;
  /** Socket pool size; match it to the work pools' combined capacity. */
  connections?: number;
}

export const DEFAULT_CONNECTIONS = 28;

// Structural views of the Octokit payloads, wide enough for every endpoint we read
interface RawUser {
  login: string;
}

interface RawRepository {
  name: string;
  full_name: string;
  owner: RawUser;
  default_branch?: string;
  archived?: boolean;
  fork: boolean;
  updated_at?: string | null;
}

interface RawPullRequestSummary {
  number: number;
  title: string;
  state: string;
  draft?: boolean;
  user: RawUser | null;
  labels: Array<{ name?: string | null }>;
  created_at: string;
  closed_at: string | null;
  merged_at: string | null;
  base: { ref: string };
}

interface RawPullRequest extends RawPullRequestSummary {
  merged: boolean;
  merged_by: RawUser | null;
  commits: number;
  additions: number;
  deletions: number;
  changed_files: number;
}

interface RawComment {
  id: number;
  user?: RawUser | null;
  body?: string | null;
  created_at: string;
}

interface RawReview {
  id: number;
  user: RawUser | null;
  body?: string | null;
  state: string;
  submitted_at?: string | null;
}

interface RawCommit {
  sha: string;
  commit: { author: { date?: string } | null };
  // simple-user, an empty object, or null depending on the schema version
  author?: unknown;
}

const REVIEW_STATES: ReadonlySet<string> = new Set<GitHubReviewState>([
  'PENDING',
  'COMMENTED',
  'APPROVED',
  'CHANGES_REQUESTED',
  'DISMISSED',
]);

function isReviewState(state: string): state is GitHubReviewState {
  return REVIEW_STATES.has(state);
}

function toRepository(repo: RawRepository): GitHubRepository {
  return {
    name: repo.name,
    full_name: repo.full_name,
    owner: { login: repo.owner.login },
    default_branch: repo.default_branch || 'main',
    archived: repo.archived ?? false,
    fork: repo.fork,
    ...(repo.updated_at && { updated_at: repo.updated_at }),
  };
}

function toPullRequestSummary(pr: RawPullRequestSummary): GitHubPullRequestSummary {
  return {
    number: pr.number,
    title: pr.title,
    state: pr.state === 'open' ? 'open' : 'closed',
    draft: pr.draft ?? false,
    ...(pr.user && { user: { login: pr.user.login } }),
    labels: pr.labels.flatMap((label) => (label.name ? [label.name] : [])),
    created_at: pr.created_at,
    ...(pr.closed_at && { closed_at: pr.closed_at }),
    ...(pr.merged_at && { merged_at: pr.merged_at }),
    base: { ref: pr.base.ref },
  };
}

function toPullRequest(pr: RawPullRequest): GitHubPullRequest {
  return {
    ...toPullRequestSummary(pr),
    merged: pr.merged,
    ...(pr.merged_by && { merged_by: { login: pr.merged_by.login } }),
    commits: pr.commits,
    additions: pr.additions,
    deletions: pr.deletions,
    changed_files: pr.changed_files,
  };
}

function toComment(comment: RawComment): GitHubComment {
  return {
    id: comment.id,
    ...(comment.user && { user: { login: comment.user.login } }),
    ...(comment.body && { body: comment.body }),
    created_at: comment.created_at,
  };
}

function toReview(review: RawReview): GitHubReview {
  return {
    id: review.id,
    ...(review.user && { user: { login: review.user.login } }),
    ...(review.body && { body: review.body }),
    state: isReviewState(review.state) ? review.state : 'COMMENTED',
    ...(review.submitted_at && { submitted_at: review.submitted_at }),
  };
}

function loginOf(user: unknown): string | undefined {
  if (typeof user === 'object' && user !== null && 'login' in user && typeof user.login === 'string') {
    return user.login;
  }
  return undefined;
}

function toCommit(commit: RawCommit): GitHubCommit {
  const date = commit.commit.author?.date;
  const login = loginOf(commit.author);
  return {
    sha: commit.sha,
    commit: { ...(date && { author: { date } }) },
    ...(login && { author: { login } }),
  };
}

function headerValue(headers: Record<string, unknown>, name: string): string | undefined {
  const value = headers[name];
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  return undefined;
}

function responseHeaders(error: object): Record<string, unknown> {
  if (
    'response' in error &&
    typeof error.response === 'object' &&
    error.response !== null &&
    'headers' in error.response &&
    typeof error.response.headers === 'object' &&
    error.response.headers !== null
  ) {
    return { ...error.response.headers };
  }
  return {};
}

/**
 * Convert Octokit errors to our own error types, keeping the rate-limit
 * headers the retry layer needs.
 */
export function toGitHubError(error: unknown): Error {
  if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
    const status = error.status;
    const message = error instanceof Error ? error.message : `GitHub API error: ${status}`;
    const headers = responseHeaders(error);

    const remainingHeader = headerValue(headers, 'x-ratelimit-remaining');
    const resetHeader = headerValue(headers, 'x-ratelimit-reset');
    const limitHeader = headerValue(headers, 'x-ratelimit-limit');
    const remaining = remainingHeader !== undefined ? parseInt(remainingHeader, 10) : undefined;
    const reset = resetHeader !== undefined ? new Date(parseInt(resetHeader, 10) * 1000) : undefined;

    // Authentication error
    if (status === 401) {
      return new GitHubAuthError('Authentication failed', { cause: error });
    }

    // Rate limit error
    if ((status === 403 || status === 429) && remaining === 0) {
      return new GitHubRateLimitError(
        0,
        reset ?? new Date(),
        limitHeader !== undefined ? parseInt(limitHeader, 10) : undefined
      );
    }

    // Not found error
    if (status === 404) {
      return new GitHubAPIError('Resource not found', 404, remaining, reset, { cause: error });
    }

    // Generic API error
    return new GitHubAPIError(message, status, remaining, reset, { cause: error });
  }

  // Non-API errors (network, etc.)
  return error instanceof Error ? error : new Error(String(error));
}

export class GitHubAPIClient implements RemoteSource {
  readonly connections: number;
  private octokit: Octokit;
  private agent: Agent;
  private closed = false;

  constructor(accessToken: string, options: GitHubClientOptions = {}) {
    this.connections = options.connections ?? DEFAULT_CONNECTIONS;
    if (!Number.isInteger(this.connections) || this.connections < 1) {
      throw new RangeError(`Connection pool size must be a positive integer, got ${this.connections}`);
    }
    const agent = new Agent({ connections: this.connections });
    this.agent = agent;
    this.octokit = new Octokit({
      auth: accessToken,
      userAgent: 'prflow-metrics',
      ...(options.baseUrl && { baseUrl: options.baseUrl }),
      request: {
        fetch: (input: RequestInfo, init: RequestInit = {}) => undiciFetch(input, { ...init, dispatcher: agent }),
      },
    });

    const timeoutMs = options.requestTimeoutMs ?? 30000;
    this.octokit.hook.before('request', (requestOptions) => {
      requestOptions.request = {
        ...requestOptions.request,
        signal: AbortSignal.timeout(timeoutMs),
      };
    });
  }

  /**
   * Resolve an organization (org mode root)
   */
  async getOrganization(org: string): Promise<GitHubAccount> {
    return this.call(async () => {
      const { data } = await this.octokit.orgs.get({ org });
      return {
        login: data.login,
        type: 'Organization' as const,
        ...(data.name && { name: data.name }),
      };
    });
  }

  /**
   * Resolve a user (user mode root)
   */
  async getUser(username: string): Promise<GitHubAccount> {
    return this.call(async () => {
      const { data } = await this.octokit.users.getByUsername({ username });
      return {
        login: data.login,
        type: data.type === 'Organization' ? ('Organization' as const) : ('User' as const),
        ...(data.name && { name: data.name }),
      };
    });
  }

  /**
   * List all repositories of an organization
   */
  async listOrganizationRepositories(org: string): Promise<GitHubRepository[]> {
    return this.call(async () => {
      const repos = await this.octokit.paginate(this.octokit.repos.listForOrg, {
        org,
        type: 'all',
        per_page: 100,
      });
      return repos.map(toRepository);
    });
  }

  /**
   * List all repositories a user owns or is a member of
   */
  async listUserRepositories(username: string): Promise<GitHubRepository[]> {
    return this.call(async () => {
      const repos = await this.octokit.paginate(this.octokit.repos.listForUser, {
        username,
        type: 'all',
        per_page: 100,
      });
      return repos.map(toRepository);
    });
  }

  async listTeams(org: string): Promise<GitHubTeam[]> {
    return this.call(async () => {
      const teams = await this.octokit.paginate(this.octokit.teams.list, { org, per_page: 100 });
      return teams.map((team) => ({ name: team.name, slug: team.slug }));
    });
  }

  async listTeamMembers(org: string, teamSlug: string): Promise<string[]> {
    return this.call(async () => {
      const members = await this.octokit.paginate(this.octokit.teams.listMembersInOrg, {
        org,
        team_slug: teamSlug,
        role: 'all',
        per_page: 100,
      });
      return members.map((member) => member.login);
    });
  }

  /**
   * List pull requests newest first. Paging stops at the first page made up
   * entirely of pull requests created before `since`.
   */
  async listPullRequests(
    owner: string,
    repo: string,
    options: ListPullRequestsOptions = {}
  ): Promise<GitHubPullRequestSummary[]> {
    return this.call(async () => {
      const { since } = options;
      const pulls = await this.octokit.paginate(
        this.octokit.pulls.list,
        {
          owner,
          repo,
          state: 'all',
          sort: 'created',
          direction: 'desc',
          per_page: 100,
        },
        (response, done) => {
          if (since && response.data.length > 0 && response.data.every((pr) => new Date(pr.created_at) < since)) {
            done();
          }
          return response.data;
        }
      );
      return pulls.map(toPullRequestSummary);
    });
  }

  /**
   * Get pull request details (sizes, commit count, merger)
   */
  async getPullRequest(owner: string, repo: string, number: number): Promise<GitHubPullRequest> {
    return this.call(async () => {
      const { data } = await this.octokit.pulls.get({ owner, repo, pull_number: number });
      return toPullRequest(data);
    });
  }

  async listReviews(owner: string, repo: string, number: number): Promise<GitHubReview[]> {
    return this.call(async () => {
      const reviews = await this.octokit.paginate(this.octokit.pulls.listReviews, {
        owner,
        repo,
        pull_number: number,
        per_page: 100,
      });
      return reviews.map(toReview);
    });
  }

  async listReviewComments(owner: string, repo: string, number: number): Promise<GitHubComment[]> {
    return this.call(async () => {
      const comments = await this.octokit.paginate(this.octokit.pulls.listReviewComments, {
        owner,
        repo,
        pull_number: number,
        per_page: 100,
      });
      return comments.map(toComment);
    });
  }

  async listIssueComments(owner: string, repo: string, number: number): Promise<GitHubComment[]> {
    return this.call(async () => {
      const comments = await this.octokit.paginate(this.octokit.issues.listComments, {
        owner,
        repo,
        issue_number: number,
        per_page: 100,
      });
      return comments.map(toComment);
    });
  }

  async listCommits(owner: string, repo: string, number: number): Promise<GitHubCommit[]> {
    return this.call(async () => {
      const commits = await this.octokit.paginate(this.octokit.pulls.listCommits, {
        owner,
        repo,
        pull_number: number,
        per_page: 100,
      });
      return commits.map(toCommit);
    });
  }

  /**
   * Get core rate limit status
   */
  async getRateLimit(): Promise<GitHubRateLimitStatus> {
    return this.call(async () => {
      const { data } = await this.octokit.rateLimit.get();
      return {
        limit: data.resources.core.limit,
        remaining: data.resources.core.remaining,
        used: data.resources.core.used,
        reset: new Date(data.resources.core.reset * 1000),
      };
    });
  }

  /**
   * Refuse further calls and close the socket pool once in-flight requests
   * finish.
   */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.agent.close();
  }

  private async call<T>(operation: () => Promise<T>): Promise<T> {
    if (this.closed) {
      throw new GitHubAPIError('GitHub client is closed');
    }
    try {
      return await operation();
    } catch (error) {
      throw toGitHubError(error);
    }
  }
}
