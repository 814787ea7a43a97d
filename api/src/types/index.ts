// Re-export types with explicit names to avoid conflicts
export type {
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
} from './github.js';

export { GitHubAPIError, GitHubAuthError, GitHubRateLimitError } from './github.js';

export type {
  BottleneckMetricsStats,
  CodeMetricsStats,
  CollaborationMetricsStats,
  CommentPostedEvent,
  CommitObservedEvent,
  FailureRecord,
  LeaderboardEntry,
  MetricBundleSnapshot,
  MetricBundleStats,
  MetricEvent,
  OrganizationSummary,
  PullRequestCreatedEvent,
  PullRequestKey,
  ReportingWindow,
  ReviewMetricsStats,
  ReviewSubmittedEvent,
  Role,
  TeamRelation,
  TimeMetricsStats,
} from './metrics.js';

export { pullRequestKey, windowDays } from './metrics.js';

export {
  ConfigurationError,
  FatalRunError,
  OrganizationFinalizedError,
  PoolClosedError,
  type RunStage,
} from './errors.js';

export type { ApiError, DetailedHealthResponse, HealthCheckResponse, ReviewRequestBody } from './api.js';
export { ReviewRequestSchema } from './api.js';
