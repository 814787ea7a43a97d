import { describe, expect, it } from 'vitest';
import { FatalRunError } from '../../../types/errors.js';
import { GitHubAPIError, GitHubAuthError } from '../../../types/github.js';
import { silentLogger } from '../../../utils/logger.js';
import {
  FakeRemoteSource,
  account,
  comment,
  commit,
  mergedPullRequest,
  pullRequest,
  repository,
  review,
  type FakeRepository,
  type FakeSourceData,
} from '../../__tests__/fakeSource.js';
import { RemoteGateway } from '../gateway.js';
import { AdmissionGovernor } from '../governor.js';
import { TieredPools } from '../pool.js';
import { createRetryPolicy, type RetryPolicy } from '../retry.js';
import { MetricsScheduler, type ReviewRequest } from '../scheduler.js';

const window = { since: new Date('2026-01-05T00:00:00Z'), until: new Date('2026-01-11T23:59:59.999Z') };
const observedAt = new Date('2026-01-12T00:00:00Z');

function setup(
  data: FakeSourceData,
  options: { limit?: number; batchSize?: number; retry?: Partial<RetryPolicy> } = {}
) {
  const source = new FakeRemoteSource(data);
  const logger = silentLogger();
  const governor = new AdmissionGovernor(options.limit ?? 15);
  const scheduler = new MetricsScheduler({
    source,
    gateway: new RemoteGateway(governor, createRetryPolicy(options.retry ?? { maxAttempts: 1 }), logger),
    pools: new TieredPools(),
    batchSize: options.batchSize,
    logger,
    now: () => observedAt,
  });
  return { source, governor, scheduler };
}

function request(overrides: Partial<ReviewRequest> = {}): ReviewRequest {
  return { organization: 'acme', window, ...overrides };
}

function repo(name: string, pulls: FakeRepository['pulls'], overrides: Partial<FakeRepository> = {}): FakeRepository {
  return { repository: repository(name), pulls, ...overrides };
}

describe('MetricsScheduler', () => {
  it('collects every pull request in the window across repositories', async () => {
    const { source, scheduler } = setup({
      account: account('acme'),
      teams: { core: ['alice', 'bob'] },
      repositories: [
        repo('api', [
          {
            pullRequest: mergedPullRequest(1, 6),
            reviews: [review(1, 'bob', 'APPROVED', '2026-01-06T12:00:00Z', 'ship it')],
            issueComments: [comment(2, 'carol')],
            commits: [commit('a', '2026-01-05T10:00:00Z')],
          },
          { pullRequest: pullRequest(2, { created_at: '2025-12-01T10:00:00Z' }) },
        ]),
        repo('web', [{ pullRequest: pullRequest(1, { user: { login: 'bob' } }) }]),
      ],
    });

    const org = await scheduler.run(request());

    expect(org.name).toBe('acme');
    expect(org.mode).toBe('organization');
    expect([...org.repositories.keys()].sort()).toEqual(['api', 'web']);
    expect(org.repositories.get('api')?.counts).toEqual({
      created: 1,
      merged: 1,
      mergedToDefault: 1,
      directToDefault: 0,
    });
    expect(org.repositories.get('api')?.metrics.time.snapshot().leadTimes).toEqual([30]);
    expect(org.repositories.get('web')?.counts.created).toBe(1);
    expect(org.users.get('bob')?.metrics.review.reviewCount).toBe(1);
    expect(org.teams.get('core')).toEqual(new Set(['alice', 'bob']));
    expect(source.callsTo('pulls.get')).toHaveLength(2);
    expect(source.callsTo('pulls.listCommits')).toEqual(['pulls.listCommits acme/api#1']);
    expect(org.failures).toEqual([]);
  });

  it('records a failing repository and finishes the other nine', async () => {
    const repositories = Array.from({ length: 10 }, (_, i) =>
      repo(`repo-${i}`, [{ pullRequest: pullRequest(1) }], i === 4 ? { failWith: new GitHubAPIError('Bad Gateway', 502) } : {})
    );
    const { source, scheduler } = setup({ account: account('acme'), repositories });

    const org = await scheduler.run(request());

    expect(org.failures).toHaveLength(1);
    expect(org.failures[0]).toMatchObject({ stage: 'repository', repository: 'repo-4', message: 'Bad Gateway' });
    expect(org.degraded).toBe(true);
    const completed = [...org.repositories.values()].filter((entry) => entry.counts.created === 1);
    expect(completed.map((entry) => entry.name).sort()).toEqual(
      ['repo-0', 'repo-1', 'repo-2', 'repo-3', 'repo-5', 'repo-6', 'repo-7', 'repo-8', 'repo-9']
    );
    expect(source.callsTo('pulls.list acme/repo-4')).toHaveLength(1);
  });

  it('isolates a repository whose listing keeps throwing under the default retry policy', async () => {
    const sleeps: number[] = [];
    const repositories = Array.from({ length: 10 }, (_, i) =>
      repo(`repo-${i}`, [{ pullRequest: pullRequest(1) }], i === 4 ? { failWith: new Error('Unexpected pull request payload') } : {})
    );
    const { source, scheduler } = setup(
      { account: account('acme'), repositories },
      {
        retry: {
          sleep: async (ms) => {
            sleeps.push(ms);
          },
        },
      }
    );

    const org = await scheduler.run(request());

    expect(source.callsTo('pulls.list acme/repo-4')).toHaveLength(3);
    expect(sleeps).toEqual([2000, 4000]);
    expect(org.failures).toHaveLength(1);
    expect(org.failures[0]).toMatchObject({
      stage: 'repository',
      repository: 'repo-4',
      message: 'Unexpected pull request payload',
    });
    const completed = [...org.repositories.values()].filter((entry) => entry.counts.created === 1);
    expect(completed).toHaveLength(9);
    expect(org.repositories.get('repo-4')?.counts.created ?? 0).toBe(0);
  });

  it('records a failing pull request and keeps the rest of its repository', async () => {
    const { scheduler } = setup({
      account: account('acme'),
      repositories: [
        repo('api', [
          { pullRequest: pullRequest(1) },
          { pullRequest: pullRequest(2), failWith: new GitHubAPIError('Resource not found', 404) },
          { pullRequest: pullRequest(3) },
        ]),
      ],
    });

    const org = await scheduler.run(request());

    expect(org.failures).toMatchObject([
      { stage: 'pull-request', repository: 'api', pullRequest: 2, message: 'Resource not found' },
    ]);
    expect(org.repositories.get('api')?.counts.created).toBe(2);
  });

  it('keeps remote calls within the governor limit and works through pull requests in batches', async () => {
    const pulls = Array.from({ length: 120 }, (_, i) => ({ pullRequest: pullRequest(i + 1) }));
    const { source, governor, scheduler } = setup(
      { account: account('acme'), repositories: [repo('api', pulls)], delayMs: 1 },
      { limit: 3, batchSize: 50 }
    );

    const org = await scheduler.run(request());

    expect(org.repositories.get('api')?.counts.created).toBe(120);
    expect(source.peakInFlight).toBeLessThanOrEqual(3);
    expect(governor.peakInFlight).toBeLessThanOrEqual(3);
    expect(governor.stats().totalAcquired).toBe(source.calls.length);

    const numbers = source.calls
      .map((call) => /#(\d+)$/.exec(call))
      .flatMap((match) => (match ? [Number(match[1])] : []));
    const batchOf = (number: number) => Math.floor((number - 1) / 50);
    for (let i = 1; i < numbers.length; i++) {
      expect(batchOf(numbers[i])).toBeGreaterThanOrEqual(batchOf(numbers[i - 1]));
    }
  });

  it('counts only the requested author in organization mode', async () => {
    const { source, scheduler } = setup({
      account: account('acme'),
      repositories: [
        repo('api', [
          { pullRequest: pullRequest(1) },
          { pullRequest: pullRequest(2, { user: { login: 'bob' } }) },
        ]),
      ],
    });

    const org = await scheduler.run(request({ user: 'bob' }));

    expect(source.callsTo('pulls.get')).toEqual(['pulls.get acme/api#2']);
    expect(org.repositories.get('api')?.contributors).toEqual(new Set(['bob']));
  });

  it('counts only members of the requested team, matched by name or slug', async () => {
    const { source, scheduler } = setup({
      account: account('acme'),
      teams: { core: ['bob'], web: ['carol'] },
      repositories: [
        repo('api', [
          { pullRequest: pullRequest(1) },
          { pullRequest: pullRequest(2, { user: { login: 'bob' } }) },
          { pullRequest: pullRequest(3, { user: { login: 'carol' } }) },
        ]),
      ],
    });

    await scheduler.run(request({ team: 'CORE' }));

    expect(source.callsTo('pulls.get')).toEqual(['pulls.get acme/api#2']);
  });

  it('fails the run for an unknown team', async () => {
    const { source, scheduler } = setup({
      account: account('acme'),
      teams: { core: ['bob'] },
      repositories: [repo('api', [{ pullRequest: pullRequest(1) }])],
    });

    const run = scheduler.run(request({ team: 'design' }));

    await expect(run).rejects.toBeInstanceOf(FatalRunError);
    await expect(run).rejects.toMatchObject({ stage: 'resolve-team' });
    expect(source.callsTo('repos.')).toEqual([]);
  });

  it('carries on without teams when membership cannot be loaded and no team was asked for', async () => {
    const { scheduler } = setup({
      account: account('acme'),
      teamsFailWith: new GitHubAPIError('Forbidden', 403, 4000),
      repositories: [repo('api', [{ pullRequest: pullRequest(1) }])],
    });

    const org = await scheduler.run(request());

    expect(org.failures).toMatchObject([{ stage: 'team-membership', message: 'Forbidden' }]);
    expect(org.repositories.get('api')?.counts.created).toBe(1);
  });

  it('fails the run when membership cannot be loaded for a team filter', async () => {
    const { scheduler } = setup({
      account: account('acme'),
      teamsFailWith: new GitHubAPIError('Forbidden', 403, 4000),
      repositories: [],
    });

    await expect(scheduler.run(request({ team: 'core' }))).rejects.toMatchObject({ stage: 'resolve-team' });
  });

  it('skips lead time when commits cannot be fetched', async () => {
    const { scheduler } = setup({
      account: account('acme'),
      repositories: [
        repo('api', [
          { pullRequest: mergedPullRequest(1, 6), commitsFailWith: new GitHubAPIError('Bad Gateway', 502) },
        ]),
      ],
    });

    const org = await scheduler.run(request());
    const time = org.repositories.get('api')?.metrics.time.snapshot();

    expect(time?.timeToMerge).toEqual([6]);
    expect(time?.leadTimes).toEqual([]);
    expect(org.failures).toEqual([]);
  });

  it('stops the run on an authentication failure', async () => {
    const { scheduler } = setup({
      account: account('acme'),
      repositories: [
        repo('api', [
          { pullRequest: pullRequest(1) },
          { pullRequest: pullRequest(2), failWith: new GitHubAuthError('Bad credentials') },
        ]),
      ],
    });

    const run = scheduler.run(request());

    await expect(run).rejects.toBeInstanceOf(FatalRunError);
    await expect(run).rejects.toMatchObject({ stage: 'pull-request', cause: expect.any(GitHubAuthError) });
  });

  it('fails the run when the organization cannot be resolved', async () => {
    const { source, scheduler } = setup({ account: account('acme'), repositories: [] });

    await expect(scheduler.run(request({ organization: 'globex' }))).rejects.toMatchObject({
      stage: 'resolve-root',
      message: '[resolve-root] Could not resolve organization "globex": Resource not found',
    });
    expect(source.calls).toEqual(['orgs.get globex']);
  });

  it('skips archived repositories and honours the repository allow-list', async () => {
    const { source, scheduler } = setup({
      account: account('acme'),
      repositories: [
        repo('api', [{ pullRequest: pullRequest(1) }]),
        { repository: repository('legacy', { archived: true }), pulls: [{ pullRequest: pullRequest(1) }] },
        repo('web', [{ pullRequest: pullRequest(1) }]),
      ],
    });

    const org = await scheduler.run(request({ repositories: ['api', 'legacy'] }));

    expect(source.callsTo('pulls.list')).toEqual(['pulls.list acme/api']);
    expect([...org.repositories.keys()]).toEqual(['api']);
  });

  it('reviews a user account without an author filter', async () => {
    const { source, scheduler } = setup({
      account: account('alice', 'User'),
      repositories: [
        {
          repository: repository('dotfiles', {}, 'alice'),
          pulls: [{ pullRequest: pullRequest(1) }, { pullRequest: pullRequest(2, { user: { login: 'bob' } }) }],
        },
      ],
    });

    const org = await scheduler.run({ user: 'alice', window });

    expect(org.mode).toBe('user');
    expect(org.repositories.get('dotfiles')?.counts.created).toBe(2);
    expect(source.callsTo('teams.')).toEqual([]);
    expect(source.callsTo('users.get')).toEqual(['users.get alice']);
    expect(source.callsTo('repos.listForUser')).toEqual(['repos.listForUser alice']);
  });

  it('rejects a team filter without an organization', async () => {
    const { scheduler } = setup({ account: account('alice', 'User'), repositories: [] });

    await expect(scheduler.run({ user: 'alice', team: 'core', window })).rejects.toMatchObject({
      stage: 'resolve-team',
    });
  });

  it('rejects a request with neither an organization nor a user', async () => {
    const { scheduler } = setup({ account: account('acme'), repositories: [] });

    await expect(scheduler.run({ window })).rejects.toMatchObject({ stage: 'resolve-root' });
  });

  it('rejects a batch size below one', () => {
    expect(() => setup({ account: account('acme'), repositories: [] }, { batchSize: 0 })).toThrow(RangeError);
  });
});
