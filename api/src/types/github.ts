// GitHub Integration Types

// GitHub API Response Types, narrowed to the fields the metrics engine reads
export interface GitHubAccount {
  login: string;
  type: 'Organization' | 'User';
  name?: string;
}

export interface GitHubRepository {
  name: string;
  full_name: string;
  owner: {
    login: string;
  };
  default_branch: string;
  archived: boolean;
  fork: boolean;
  updated_at?: string;
}

export interface GitHubPullRequestSummary {
  number: number;
  title: string;
  state: 'open' | 'closed';
  draft: boolean;
  user?: {
    login: string;
  };
  labels: string[];
  created_at: string;
  closed_at?: string;
  merged_at?: string;
  base: {
    ref: string;
  };
}

export interface GitHubPullRequest extends GitHubPullRequestSummary {
  merged: boolean;
  merged_by?: {
    login: string;
  };
  commits: number;
  additions: number;
  deletions: number;
  changed_files: number;
}

export type GitHubReviewState =
  | 'PENDING'
  | 'COMMENTED'
  | 'APPROVED'
  | 'CHANGES_REQUESTED'
  | 'DISMISSED';

export interface GitHubReview {
  id: number;
  user?: {
    login: string;
  };
  body?: string;
  state: GitHubReviewState;
  submitted_at?: string;
}

export interface GitHubComment {
  id: number;
  user?: {
    login: string;
  };
  body?: string;
  created_at: string;
}

export interface GitHubCommit {
  sha: string;
  commit: {
    author?: {
      date?: string;
    };
  };
  author?: {
    login: string;
  };
}

export interface GitHubTeam {
  name: string;
  slug: string;
}

export interface GitHubRateLimitStatus {
  limit: number;
  remaining: number;
  used: number;
  reset: Date;
}

// Error Types
export class GitHubAPIError extends Error {
  constructor(
    message: string,
    public statusCode?: number,
    public rateLimitRemaining?: number,
    public rateLimitReset?: Date,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'GitHubAPIError';
  }
}

export class GitHubRateLimitError extends GitHubAPIError {
  constructor(
    public override rateLimitRemaining: number,
    public override rateLimitReset: Date,
    public limit?: number
  ) {
    super(`GitHub API rate limit exceeded. Resets at ${rateLimitReset.toISOString()}`, 403);
    this.name = 'GitHubRateLimitError';
  }
}

export class GitHubAuthError extends GitHubAPIError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 401, undefined, undefined, options);
    this.name = 'GitHubAuthError';
  }
}
