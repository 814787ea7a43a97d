import { describe, expect, it } from 'vitest';
import type { ReviewSubmittedEvent } from '../../../types/metrics.js';
import { comment, commit, mergedPullRequest, pullRequest, review } from '../../__tests__/fakeSource.js';
import { GHOST_LOGIN, buildPullRequestEvents, participantOf, teamRelation, type PullRequestBundle } from '../events.js';

const membership: Record<string, string[]> = { alice: ['core'], bob: ['core'], carol: ['web'] };
const teamsOf = (login: string) => new Set(membership[login] ?? []);
const observedAt = new Date('2026-01-12T00:00:00Z');

function bundle(overrides: Partial<PullRequestBundle> = {}): PullRequestBundle {
  return {
    repository: 'api',
    defaultBranch: 'main',
    pullRequest: pullRequest(7),
    reviews: [],
    reviewComments: [],
    issueComments: [],
    observedAt,
    teamsOf,
    ...overrides,
  };
}

describe('teamRelation', () => {
  it('tells apart self, same-team, cross-team and external reviews', () => {
    expect(teamRelation('alice', 'alice', teamsOf)).toBe('self');
    expect(teamRelation('alice', 'bob', teamsOf)).toBe('same-team');
    expect(teamRelation('alice', 'carol', teamsOf)).toBe('cross-team');
    expect(teamRelation('alice', 'dave', teamsOf)).toBe('external');
    expect(teamRelation('dave', 'alice', teamsOf)).toBe('external');
  });
});

describe('buildPullRequestEvents', () => {
  const merged = bundle({
    pullRequest: mergedPullRequest(7, 30, { labels: ['backend'] }),
    reviews: [
      review(3, 'carol', 'APPROVED', '2026-01-07T12:00:00Z'),
      review(1, 'alice', 'COMMENTED', '2026-01-06T11:00:00Z', 'self note'),
      review(2, 'bob', 'CHANGES_REQUESTED', '2026-01-06T14:00:00Z', 'please fix'),
      review(4, 'bob', 'CHANGES_REQUESTED', '2026-01-07T09:00:00Z', '   '),
      review(5, 'dave', 'PENDING', '2026-01-07T10:00:00Z'),
      { id: 6, state: 'APPROVED', submitted_at: '2026-01-07T11:00:00Z' },
      review(7, 'bob', 'CHANGES_REQUESTED', '2026-01-07T14:00:00Z'),
    ],
    reviewComments: [comment(10, 'carol')],
    issueComments: [comment(11, 'dave'), { id: 12, created_at: '2026-01-06T13:00:00Z' }],
    commits: [commit('b', '2026-01-05T12:00:00Z'), commit('a', '2026-01-04T09:00:00Z')],
  });

  it('emits one pr-created event describing the pull request', () => {
    const [created] = buildPullRequestEvents(merged);

    expect(created).toEqual({
      type: 'pr-created',
      repository: 'api',
      key: 'api#7',
      number: 7,
      author: 'alice',
      title: 'Change 7',
      labels: ['backend'],
      state: 'closed',
      createdAt: new Date('2026-01-06T10:00:00Z'),
      mergedAt: new Date('2026-01-07T16:00:00Z'),
      closedAt: new Date('2026-01-07T16:00:00Z'),
      mergedBy: 'alice',
      baseRef: 'main',
      isDefaultBranch: true,
      additions: 10,
      deletions: 5,
      changedFiles: 2,
      commitCount: 1,
      reviewerCount: 2,
      observedAt,
    });
  });

  it('orders submitted reviews by time and marks firsts and cycles', () => {
    const reviews = buildPullRequestEvents(merged).filter(
      (event): event is ReviewSubmittedEvent => event.type === 'review-submitted'
    );

    expect(
      reviews.map(({ reviewer, hasBody, isFirstReview, isFirstFromReviewer, opensCycle, teamRelation }) => ({
        reviewer,
        hasBody,
        isFirstReview,
        isFirstFromReviewer,
        opensCycle,
        teamRelation,
      }))
    ).toEqual([
      { reviewer: 'alice', hasBody: true, isFirstReview: false, isFirstFromReviewer: true, opensCycle: false, teamRelation: 'self' },
      { reviewer: 'bob', hasBody: true, isFirstReview: true, isFirstFromReviewer: true, opensCycle: true, teamRelation: 'same-team' },
      { reviewer: 'bob', hasBody: false, isFirstReview: false, isFirstFromReviewer: false, opensCycle: false, teamRelation: 'same-team' },
      { reviewer: 'carol', hasBody: false, isFirstReview: false, isFirstFromReviewer: true, opensCycle: false, teamRelation: 'cross-team' },
      { reviewer: 'bob', hasBody: false, isFirstReview: false, isFirstFromReviewer: false, opensCycle: true, teamRelation: 'same-team' },
    ]);
  });

  it('emits comments from both threads and skips deleted accounts', () => {
    const comments = buildPullRequestEvents(merged).filter((event) => event.type === 'comment-posted');

    expect(comments).toEqual([
      { type: 'comment-posted', repository: 'api', key: 'api#7', number: 7, author: 'alice', commenter: 'carol', kind: 'review' },
      { type: 'comment-posted', repository: 'api', key: 'api#7', number: 7, author: 'alice', commenter: 'dave', kind: 'issue' },
    ]);
  });

  it('dates the first commit from the earliest author date', () => {
    const events = buildPullRequestEvents(merged);

    expect(events[events.length - 1]).toEqual({
      type: 'commit-observed',
      repository: 'api',
      key: 'api#7',
      number: 7,
      author: 'alice',
      firstCommitAt: new Date('2026-01-04T09:00:00Z'),
      mergedAt: new Date('2026-01-07T16:00:00Z'),
      commitCount: 2,
    });
  });

  it('skips the commit event for an unmerged pull request or missing commits', () => {
    const open = buildPullRequestEvents(bundle({ commits: [commit('a', '2026-01-04T09:00:00Z')] }));
    const unfetched = buildPullRequestEvents(bundle({ pullRequest: mergedPullRequest(7, 2) }));

    expect(open.map((event) => event.type)).toEqual(['pr-created']);
    expect(unfetched.map((event) => event.type)).toEqual(['pr-created']);
  });

  it('attributes a pull request from a deleted account to the ghost login', () => {
    const [created] = buildPullRequestEvents(
      bundle({ pullRequest: pullRequest(8, { user: undefined, base: { ref: 'release' } }) })
    );

    expect(created).toMatchObject({ author: GHOST_LOGIN, isDefaultBranch: false, reviewerCount: 0 });
  });
});

describe('participantOf', () => {
  it('returns the reviewer or commenter unless they wrote the pull request', () => {
    const events = buildPullRequestEvents(
      bundle({
        reviews: [review(1, 'bob', 'APPROVED', '2026-01-06T12:00:00Z'), review(2, 'alice', 'COMMENTED', '2026-01-06T13:00:00Z')],
        issueComments: [comment(3, 'alice'), comment(4, 'carol')],
      })
    );

    expect(events.map(participantOf)).toEqual([undefined, 'bob', undefined, undefined, 'carol']);
  });
});
