import { FatalRunError, errorMessage } from '../../types/errors.js';
import type { GitHubPullRequestSummary, GitHubRepository } from '../../types/github.js';
import type { ReportingWindow } from '../../types/metrics.js';
import { getLogger, type Logger } from '../../utils/logger.js';
import type { RemoteSource } from '../github/source.js';
import { Organization } from '../metrics/entities.js';
import { buildPullRequestEvents } from '../metrics/events.js';
import type { RemoteGateway } from './gateway.js';
import type { TieredPools } from './pool.js';
import { classifyError } from './retry.js';

export const DEFAULT_BATCH_SIZE = 50;

export interface ReviewRequest {
  /** Organization to review. Without it, `user` names the account whose repositories are reviewed. */
  organization?: string;
  /** In organization mode, only pull requests authored by this login count. */
  user?: string;
  /** Team name or slug; only pull requests by its members count. */
  team?: string;
  window: ReportingWindow;
  /** Restricts the run to these repository names. */
  repositories?: string[];
}

export interface SchedulerOptions {
  source: RemoteSource;
  gateway: RemoteGateway;
  pools: TieredPools;
  batchSize?: number;
  logger?: Logger;
  now?: () => Date;
}

interface RunState {
  request: ReviewRequest;
  org: Organization;
  observedAt: Date;
  teamMembers?: ReadonlySet<string>;
  fatal?: FatalRunError;
}

function isAuthFailure(error: unknown): boolean {
  return classifyError(error).kind === 'auth';
}

function inWindow(createdAt: string, window: ReportingWindow): boolean {
  const time = new Date(createdAt).getTime();
  return time >= window.since.getTime() && time <= window.until.getTime();
}

/**
 * Fans a review out over repositories, pull requests and their
 * sub-resources, and folds everything into one Organization.
 *
 * Repository and pull-request failures are recorded on the organization and
 * the run goes on. Failing to resolve the root, the team filter or the
 * repository list ends the run, as does an authentication failure anywhere.
 */
export class MetricsScheduler {
  private readonly source: RemoteSource;
  private readonly gateway: RemoteGateway;
  private readonly pools: TieredPools;
  private readonly batchSize: number;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(options: SchedulerOptions) {
    this.source = options.source;
    this.gateway = options.gateway;
    this.pools = options.pools;
    this.batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE;
    this.logger = (options.logger ?? getLogger()).child({ module: 'scheduler' });
    this.now = options.now ?? (() => new Date());

    if (!Number.isInteger(this.batchSize) || this.batchSize < 1) {
      throw new RangeError(`Batch size must be a positive integer, got ${this.batchSize}`);
    }
  }

  async run(request: ReviewRequest): Promise<Organization> {
    const state = await this.resolveRoot(request);
    const log = this.logger.child({ organization: state.org.name });

    if (state.org.mode === 'organization') {
      await this.loadTeams(state);
    } else if (request.team) {
      throw new FatalRunError('resolve-team', 'A team filter needs an organization');
    }

    const repositories = await this.listRepositories(state);
    log.info({ repositories: repositories.length }, 'Processing repositories');

    const results = await Promise.allSettled(
      repositories.map((repository) =>
        this.pools.repository.submit(() => this.processRepository(state, repository))
      )
    );

    // Fan-in barrier: every repository task has settled
    results.forEach((result, index) => {
      if (result.status === 'rejected') {
        this.onFailure(state, 'repository', result.reason, { repository: repositories[index].name });
      }
    });

    if (state.fatal) {
      throw state.fatal;
    }

    log.info(
      { repositories: state.org.repositories.size, failures: state.org.failures.length },
      'Review run complete'
    );
    return state.org;
  }

  private async resolveRoot(request: ReviewRequest): Promise<RunState> {
    const { organization, user } = request;
    const base = { request, observedAt: this.now() };

    try {
      if (organization) {
        const account = await this.gateway.call('orgs.get', () => this.source.getOrganization(organization));
        return { ...base, org: new Organization(account.login, 'organization') };
      }
      if (user) {
        const account = await this.gateway.call('users.get', () => this.source.getUser(user));
        return { ...base, org: new Organization(account.login, 'user') };
      }
    } catch (error) {
      const root = organization ? `organization "${organization}"` : `user "${user}"`;
      throw new FatalRunError('resolve-root', `Could not resolve ${root}: ${errorMessage(error)}`, { cause: error });
    }

    throw new FatalRunError('resolve-root', 'Either an organization or a user is required');
  }

  private async loadTeams(state: RunState): Promise<void> {
    const { org, request } = state;

    try {
      const teams = await this.gateway.call('teams.list', () => this.source.listTeams(org.name));
      const memberships = await Promise.all(
        teams.map(async (team) => ({
          team,
          members: await this.gateway.call(`teams.listMembers ${team.slug}`, () =>
            this.source.listTeamMembers(org.name, team.slug)
          ),
        }))
      );
      for (const { team, members } of memberships) {
        org.addTeam(team.slug, members);
      }

      if (request.team) {
        const wanted = request.team.toLowerCase();
        const match = teams.find((team) => team.slug.toLowerCase() === wanted || team.name.toLowerCase() === wanted);
        if (!match) {
          throw new FatalRunError('resolve-team', `Team "${request.team}" not found in ${org.name}`);
        }
        state.teamMembers = org.teams.get(match.slug) ?? new Set();
      }
    } catch (error) {
      if (error instanceof FatalRunError) throw error;
      if (request.team || isAuthFailure(error)) {
        throw new FatalRunError('resolve-team', `Could not load team membership: ${errorMessage(error)}`, {
          cause: error,
        });
      }

      // Without a team filter, membership only feeds the team-relation counters
      this.logger.warn({ err: error }, 'Could not load team membership; continuing without teams');
      org.recordFailure({ stage: 'team-membership', message: errorMessage(error) });
    }
  }

  private async listRepositories(state: RunState): Promise<GitHubRepository[]> {
    const { org, request } = state;
    let repositories: GitHubRepository[];

    try {
      repositories =
        org.mode === 'organization'
          ? await this.gateway.call('repos.listForOrg', () => this.source.listOrganizationRepositories(org.name))
          : await this.gateway.call('repos.listForUser', () => this.source.listUserRepositories(org.name));
    } catch (error) {
      throw new FatalRunError('list-repositories', `Could not list repositories: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    const allowed = request.repositories?.length ? new Set(request.repositories) : undefined;
    return repositories.filter((repository) => {
      if (repository.archived) {
        this.logger.debug({ repository: repository.name }, 'Skipping archived repository');
        return false;
      }
      return !allowed || allowed.has(repository.name);
    });
  }

  private async processRepository(state: RunState, repository: GitHubRepository): Promise<void> {
    if (state.fatal) return;

    const { org, request } = state;
    const owner = repository.owner.login;
    const log = this.logger.child({ repository: repository.name });

    org.getOrCreateRepository(repository.name, repository.default_branch);

    const pulls = await this.gateway.call(`pulls.list ${repository.full_name}`, () =>
      this.source.listPullRequests(owner, repository.name, { since: request.window.since })
    );

    const authorFilter = org.mode === 'organization' ? request.user : undefined;
    const relevant = pulls.filter((pull) => {
      if (!inWindow(pull.created_at, request.window)) return false;
      const author = pull.user?.login;
      if (authorFilter && author !== authorFilter) return false;
      if (state.teamMembers && (!author || !state.teamMembers.has(author))) return false;
      return true;
    });

    log.debug({ pullRequests: relevant.length }, 'Processing pull requests');

    for (let start = 0; start < relevant.length; start += this.batchSize) {
      if (state.fatal) return;

      const batch = relevant.slice(start, start + this.batchSize);
      const results = await Promise.allSettled(
        batch.map((pull) => this.pools.pullRequest.submit(() => this.processPullRequest(state, repository, pull)))
      );

      results.forEach((result, index) => {
        if (result.status === 'rejected') {
          this.onFailure(state, 'pull-request', result.reason, {
            repository: repository.name,
            pullRequest: batch[index].number,
          });
        }
      });
    }
  }

  private async processPullRequest(
    state: RunState,
    repository: GitHubRepository,
    pull: GitHubPullRequestSummary
  ): Promise<void> {
    if (state.fatal) return;

    const owner = repository.owner.login;
    const name = repository.name;
    const ref = `${repository.full_name}#${pull.number}`;
    const fetch = <T>(label: string, operation: () => Promise<T>): Promise<T> =>
      this.pools.subResource.submit(() => this.gateway.call(`${label} ${ref}`, operation));

    const [pullRequest, reviews, reviewComments, issueComments, commits] = await Promise.all([
      fetch('pulls.get', () => this.source.getPullRequest(owner, name, pull.number)),
      fetch('pulls.listReviews', () => this.source.listReviews(owner, name, pull.number)),
      fetch('pulls.listReviewComments', () => this.source.listReviewComments(owner, name, pull.number)),
      fetch('issues.listComments', () => this.source.listIssueComments(owner, name, pull.number)),
      pull.merged_at
        ? fetch('pulls.listCommits', () => this.source.listCommits(owner, name, pull.number)).catch((error: unknown) => {
            if (isAuthFailure(error)) throw error;
            // Lead time is left out for this pull request
            this.logger.warn({ pullRequest: ref, err: error }, 'Could not fetch commits; skipping lead time');
            return undefined;
          })
        : Promise.resolve(undefined),
    ]);

    const events = buildPullRequestEvents({
      repository: name,
      defaultBranch: repository.default_branch,
      pullRequest,
      reviews,
      reviewComments,
      issueComments,
      commits,
      observedAt: state.observedAt,
      teamsOf: (login) => state.org.teamsOf(login),
    });

    for (const event of events) {
      state.org.apply(event);
    }
  }

  private onFailure(
    state: RunState,
    stage: 'repository' | 'pull-request',
    error: unknown,
    where: { repository: string; pullRequest?: number }
  ): void {
    if (isAuthFailure(error)) {
      if (!state.fatal) {
        this.logger.error({ ...where, err: error }, 'Authentication failed; no new work will be started');
        state.fatal = new FatalRunError(stage, `Authentication failed: ${errorMessage(error)}`, {
          cause: error,
        });
      }
      return;
    }

    this.logger.error({ ...where, err: error }, `Error processing ${stage}: ${errorMessage(error)}`);
    state.org.recordFailure({ stage, ...where, message: errorMessage(error) });
  }
}
