export { loadConfig, readConfigFile, requireGitHubToken, type AppConfig } from './config/index.js';

export { AdmissionGovernor, type GovernorStats, type ReleaseHandle } from './services/engine/governor.js';
export { RemoteGateway } from './services/engine/gateway.js';
export { DEFAULT_TIER_SIZES, TieredPools, WorkPool, type PoolStats, type TierSizes } from './services/engine/pool.js';
export {
  DEFAULT_RETRY_POLICY,
  backoffDelay,
  classifyError,
  createRetryPolicy,
  executeWithPolicy,
  retryDelay,
  type Classification,
  type FailureClass,
  type RetryPolicy,
} from './services/engine/retry.js';
export { MetricsScheduler, type ReviewRequest, type SchedulerOptions } from './services/engine/scheduler.js';

export { GitHubAPIClient, toGitHubError, type GitHubClientOptions } from './services/github/client.js';
export type { ListPullRequestsOptions, RemoteSource } from './services/github/source.js';

export {
  BottleneckMetrics,
  CodeMetrics,
  CollaborationMetrics,
  MetricBundle,
  ReviewMetrics,
  TimeMetrics,
  type Accumulator,
} from './services/metrics/accumulators/index.js';
export { Organization, Repository, User, type RunMode } from './services/metrics/entities.js';
export { buildPullRequestEvents, teamRelation, type PullRequestBundle } from './services/metrics/events.js';
export { rollup } from './services/metrics/rollup.js';
export { readLatestSnapshot, toSnapshot, writeSnapshot, type OrganizationSnapshot } from './services/metrics/snapshot.js';

export { ReviewService, createReviewService, type ReviewResult } from './services/review.js';
export { buildServer, startServer } from './server.js';
export { resolveWindow } from './utils/window.js';

export * from './types/index.js';
