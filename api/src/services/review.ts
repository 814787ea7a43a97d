import { requireGitHubToken, type AppConfig } from '../config/index.js';
import type { GitHubRateLimitStatus } from '../types/github.js';
import type { OrganizationSummary } from '../types/metrics.js';
import { getLogger, type Logger } from '../utils/logger.js';
import { RemoteGateway } from './engine/gateway.js';
import { AdmissionGovernor, type GovernorStats } from './engine/governor.js';
import { TieredPools, type PoolStats, type TierSizes } from './engine/pool.js';
import { createRetryPolicy, type RetryPolicy } from './engine/retry.js';
import { MetricsScheduler, type ReviewRequest } from './engine/scheduler.js';
import { GitHubAPIClient } from './github/client.js';
import type { RemoteSource } from './github/source.js';
import type { Organization } from './metrics/entities.js';
import { rollup } from './metrics/rollup.js';
import { readLatestSnapshot, toSnapshot, writeSnapshot, type OrganizationSnapshot } from './metrics/snapshot.js';

export interface ReviewServiceOptions {
  source: RemoteSource;
  engine: AppConfig['engine'];
  /** Defaults to pools sized from `engine`. */
  pools?: TieredPools;
  retry?: Partial<RetryPolicy>;
  snapshotDir?: string;
  logger?: Logger;
  now?: () => Date;
}

export function tierSizes(engine: AppConfig['engine']): TierSizes {
  return {
    repository: engine.repositoryConcurrency,
    pullRequest: engine.pullRequestConcurrency,
    subResource: engine.subResourceConcurrency,
  };
}

export interface ReviewResult {
  organization: Organization;
  summary: OrganizationSummary;
  snapshot: OrganizationSnapshot;
  path: string;
}

export interface EngineStats {
  governor: GovernorStats;
  pools: PoolStats[];
}

/**
 * Owns the process-wide engine pieces (governor, pools, retry policy, GitHub
 * source) and runs one review end to end: schedule, roll up, write snapshot.
 */
export class ReviewService {
  readonly governor: AdmissionGovernor;
  readonly pools: TieredPools;
  readonly policy: RetryPolicy;
  private readonly source: RemoteSource;
  private readonly scheduler: MetricsScheduler;
  private readonly snapshotDir?: string;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private shutdownPromise?: Promise<void>;

  constructor(options: ReviewServiceOptions) {
    const { engine } = options;
    this.logger = (options.logger ?? getLogger()).child({ module: 'review' });
    this.source = options.source;
    this.snapshotDir = options.snapshotDir;
    this.now = options.now ?? (() => new Date());
    this.governor = new AdmissionGovernor(engine.governorLimit);
    this.pools = options.pools ?? new TieredPools(tierSizes(engine));
    this.policy = createRetryPolicy(options.retry);
    this.scheduler = new MetricsScheduler({
      source: this.source,
      gateway: new RemoteGateway(this.governor, this.policy, this.logger),
      pools: this.pools,
      batchSize: engine.batchSize,
      logger: this.logger,
      now: this.now,
    });
  }

  async run(request: ReviewRequest): Promise<ReviewResult> {
    const started = Date.now();
    const organization = await this.scheduler.run(request);
    const summary = rollup(organization, request.window);
    const snapshot = toSnapshot(organization, summary, request.window, this.now());
    const path = await writeSnapshot(snapshot, this.snapshotDir);

    this.logger.info(
      {
        organization: organization.name,
        prsCreated: summary.prsCreated,
        failedTasks: summary.failedTasks,
        durationMs: Date.now() - started,
        path,
      },
      'Review finished'
    );
    return { organization, summary, snapshot, path };
  }

  async latest(): Promise<{ path: string; snapshot: OrganizationSnapshot } | undefined> {
    return readLatestSnapshot(this.snapshotDir);
  }

  rateLimit(): Promise<GitHubRateLimitStatus> {
    return this.source.getRateLimit();
  }

  stats(): EngineStats {
    return { governor: this.governor.stats(), pools: this.pools.stats() };
  }

  /** Drains every pool, then closes the GitHub source. Safe to call twice. */
  shutdown(): Promise<void> {
    if (!this.shutdownPromise) {
      this.shutdownPromise = (async () => {
        await this.pools.shutdown();
        await this.source.close();
        this.logger.info('Review service shut down');
      })();
    }
    return this.shutdownPromise;
  }
}

/** The GitHub client, with one socket for every call the pools can have in flight. */
export function createGitHubSource(config: AppConfig, pools: TieredPools): GitHubAPIClient {
  return new GitHubAPIClient(requireGitHubToken(config), {
    requestTimeoutMs: config.github.requestTimeoutMs,
    connections: pools.capacity,
  });
}

export function createReviewService(config: AppConfig, logger?: Logger): ReviewService {
  const pools = new TieredPools(tierSizes(config.engine));
  return new ReviewService({
    source: createGitHubSource(config, pools),
    engine: config.engine,
    pools,
    retry: config.retry,
    snapshotDir: config.snapshotDir,
    logger,
  });
}
