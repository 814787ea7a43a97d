import {
  pullRequestKey,
  type CommentPostedEvent,
  type CommitObservedEvent,
  type PullRequestCreatedEvent,
  type ReviewSubmittedEvent,
} from '../../../types/metrics.js';

type Fields<T> = Partial<Omit<T, 'type' | 'key' | 'number'>>;

function base(number: number, fields: { repository?: string; author?: string }) {
  const repository = fields.repository ?? 'api';
  return { repository, key: pullRequestKey(repository, number), number, author: fields.author ?? 'alice' };
}

export function prCreated(number: number, fields: Fields<PullRequestCreatedEvent> = {}): PullRequestCreatedEvent {
  return {
    type: 'pr-created',
    title: `Change ${number}`,
    labels: [],
    state: 'open',
    createdAt: new Date('2026-01-06T10:00:00Z'),
    baseRef: 'main',
    isDefaultBranch: true,
    additions: 10,
    deletions: 5,
    changedFiles: 2,
    commitCount: 1,
    reviewerCount: 0,
    observedAt: new Date('2026-01-12T00:00:00Z'),
    ...fields,
    ...base(number, fields),
  };
}

export function reviewSubmitted(
  number: number,
  reviewer: string,
  fields: Fields<ReviewSubmittedEvent> = {}
): ReviewSubmittedEvent {
  return {
    type: 'review-submitted',
    reviewer,
    state: 'APPROVED',
    submittedAt: new Date('2026-01-06T14:00:00Z'),
    prCreatedAt: new Date('2026-01-06T10:00:00Z'),
    hasBody: false,
    isFirstReview: false,
    isFirstFromReviewer: true,
    opensCycle: false,
    teamRelation: 'external',
    ...fields,
    ...base(number, fields),
  };
}

export function commentPosted(
  number: number,
  commenter: string,
  fields: Fields<CommentPostedEvent> = {}
): CommentPostedEvent {
  return {
    type: 'comment-posted',
    commenter,
    kind: 'issue',
    ...fields,
    ...base(number, fields),
  };
}

export function commitObserved(number: number, fields: Fields<CommitObservedEvent> = {}): CommitObservedEvent {
  return {
    type: 'commit-observed',
    firstCommitAt: new Date('2026-01-05T14:00:00Z'),
    mergedAt: new Date('2026-01-06T14:00:00Z'),
    commitCount: 1,
    ...fields,
    ...base(number, fields),
  };
}

/** Deterministic PRNG (mulberry32) so shuffled orders are reproducible. */
export function seededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function shuffle<T>(items: readonly T[], random: () => number): T[] {
  const result = [...items];
  for (let i = result.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    [result[i], result[j]] = [result[j], result[i]];
  }
  return result;
}
