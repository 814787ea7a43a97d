import type { GitHubComment, GitHubCommit, GitHubPullRequest, GitHubReview } from '../../types/github.js';
import {
  pullRequestKey,
  type CommentPostedEvent,
  type MetricEvent,
  type ReviewSubmittedEvent,
  type TeamRelation,
} from '../../types/metrics.js';

/** GitHub shows deleted accounts as this login. */
export const GHOST_LOGIN = 'ghost';

/** One pull request's resources, as fetched by a pull-request task. */
export interface PullRequestBundle {
  repository: string;
  defaultBranch: string;
  pullRequest: GitHubPullRequest;
  reviews: GitHubReview[];
  reviewComments: GitHubComment[];
  issueComments: GitHubComment[];
  /** Missing when the commit list could not be fetched, or the PR is unmerged. */
  commits?: GitHubCommit[];
  observedAt: Date;
  teamsOf: (login: string) => ReadonlySet<string>;
}

interface SubmittedReview {
  reviewer: string;
  state: GitHubReview['state'];
  submittedAt: Date;
  hasBody: boolean;
}

export function teamRelation(
  author: string,
  reviewer: string,
  teamsOf: (login: string) => ReadonlySet<string>
): TeamRelation {
  if (author === reviewer) return 'self';

  const authorTeams = teamsOf(author);
  const reviewerTeams = teamsOf(reviewer);
  for (const team of reviewerTeams) {
    if (authorTeams.has(team)) return 'same-team';
  }
  return authorTeams.size > 0 && reviewerTeams.size > 0 ? 'cross-team' : 'external';
}

function hasText(body: string | undefined): boolean {
  return body !== undefined && body.trim().length > 0;
}

function submittedReviews(reviews: GitHubReview[]): SubmittedReview[] {
  const submitted: SubmittedReview[] = [];
  for (const review of reviews) {
    if (!review.user || !review.submitted_at || review.state === 'PENDING') continue;
    submitted.push({
      reviewer: review.user.login,
      state: review.state,
      submittedAt: new Date(review.submitted_at),
      hasBody: hasText(review.body),
    });
  }
  return submitted.sort((a, b) => a.submittedAt.getTime() - b.submittedAt.getTime());
}

function firstCommitDate(commits: GitHubCommit[]): Date | undefined {
  let first: number | undefined;
  for (const commit of commits) {
    const date = commit.commit.author?.date;
    if (!date) continue;
    const time = new Date(date).getTime();
    if (first === undefined || time < first) first = time;
  }
  return first === undefined ? undefined : new Date(first);
}

/**
 * Turns one pull request's fetched resources into metric events: one
 * `pr-created`, one `review-submitted` per submitted review, one
 * `comment-posted` per comment and, for merged pull requests whose commits
 * were fetched, one `commit-observed`.
 */
export function buildPullRequestEvents(bundle: PullRequestBundle): MetricEvent[] {
  const { pullRequest: pr, repository } = bundle;
  const key = pullRequestKey(repository, pr.number);
  const author = pr.user?.login ?? GHOST_LOGIN;
  const createdAt = new Date(pr.created_at);
  const mergedAt = pr.merged && pr.merged_at ? new Date(pr.merged_at) : undefined;
  const base = { repository, key, number: pr.number, author };

  const reviews = submittedReviews(bundle.reviews);
  const reviewers = new Set(reviews.map((review) => review.reviewer).filter((reviewer) => reviewer !== author));

  const events: MetricEvent[] = [
    {
      ...base,
      type: 'pr-created',
      title: pr.title,
      labels: pr.labels,
      state: pr.state,
      createdAt,
      mergedAt,
      closedAt: pr.closed_at ? new Date(pr.closed_at) : undefined,
      mergedBy: pr.merged_by?.login,
      baseRef: pr.base.ref,
      isDefaultBranch: pr.base.ref === bundle.defaultBranch,
      additions: pr.additions,
      deletions: pr.deletions,
      changedFiles: pr.changed_files,
      commitCount: pr.commits,
      reviewerCount: reviewers.size,
      observedAt: bundle.observedAt,
    },
  ];

  const seenReviewers = new Set<string>();
  let firstReviewSeen = false;
  let previousState: GitHubReview['state'] | undefined;

  for (const review of reviews) {
    const isFirstReview = !firstReviewSeen && review.reviewer !== author;
    if (isFirstReview) firstReviewSeen = true;

    const event: ReviewSubmittedEvent = {
      ...base,
      type: 'review-submitted',
      reviewer: review.reviewer,
      state: review.state,
      submittedAt: review.submittedAt,
      prCreatedAt: createdAt,
      hasBody: review.hasBody,
      isFirstReview,
      isFirstFromReviewer: !seenReviewers.has(review.reviewer),
      opensCycle: review.state === 'CHANGES_REQUESTED' && previousState !== 'CHANGES_REQUESTED',
      teamRelation: teamRelation(author, review.reviewer, bundle.teamsOf),
    };
    events.push(event);

    seenReviewers.add(review.reviewer);
    previousState = review.state;
  }

  const comments: Array<[GitHubComment, CommentPostedEvent['kind']]> = [
    ...bundle.reviewComments.map((comment): [GitHubComment, CommentPostedEvent['kind']] => [comment, 'review']),
    ...bundle.issueComments.map((comment): [GitHubComment, CommentPostedEvent['kind']] => [comment, 'issue']),
  ];
  for (const [comment, kind] of comments) {
    if (!comment.user) continue;
    events.push({ ...base, type: 'comment-posted', commenter: comment.user.login, kind });
  }

  if (mergedAt && bundle.commits && bundle.commits.length > 0) {
    const firstCommitAt = firstCommitDate(bundle.commits);
    if (firstCommitAt) {
      events.push({
        ...base,
        type: 'commit-observed',
        firstCommitAt,
        mergedAt,
        commitCount: bundle.commits.length,
      });
    }
  }

  return events;
}

/** The login other than the author that an event involves, if any. */
export function participantOf(event: MetricEvent): string | undefined {
  switch (event.type) {
    case 'review-submitted':
      return event.reviewer !== event.author ? event.reviewer : undefined;
    case 'comment-posted':
      return event.commenter !== event.author ? event.commenter : undefined;
    default:
      return undefined;
  }
}
