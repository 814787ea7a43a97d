// Metric Event and Snapshot Types

import type { GitHubReviewState } from './github.js';

/** `"<repository>#<number>"`, unique across an organization. */
export type PullRequestKey = string;

export function pullRequestKey(repository: string, number: number): PullRequestKey {
  return `${repository}#${number}`;
}

interface EventBase {
  repository: string;
  key: PullRequestKey;
  number: number;
  /** Login of the pull request's author. */
  author: string;
}

export interface PullRequestCreatedEvent extends EventBase {
  type: 'pr-created';
  title: string;
  labels: string[];
  state: 'open' | 'closed';
  createdAt: Date;
  mergedAt?: Date;
  closedAt?: Date;
  mergedBy?: string;
  baseRef: string;
  isDefaultBranch: boolean;
  additions: number;
  deletions: number;
  changedFiles: number;
  commitCount: number;
  /** Distinct reviewers other than the author. */
  reviewerCount: number;
  /** Reference time for age-based checks (stale, long-running). */
  observedAt: Date;
}

export interface ReviewSubmittedEvent extends EventBase {
  type: 'review-submitted';
  reviewer: string;
  state: GitHubReviewState;
  submittedAt: Date;
  prCreatedAt: Date;
  hasBody: boolean;
  /** Earliest review on the pull request by someone other than the author. */
  isFirstReview: boolean;
  /** This reviewer's earliest review on the pull request. */
  isFirstFromReviewer: boolean;
  /** A changes-requested review not directly preceded by another one. */
  opensCycle: boolean;
  /** Team relation between author and reviewer. */
  teamRelation: TeamRelation;
}

export interface CommentPostedEvent extends EventBase {
  type: 'comment-posted';
  commenter: string;
  kind: 'review' | 'issue';
}

export interface CommitObservedEvent extends EventBase {
  type: 'commit-observed';
  firstCommitAt: Date;
  mergedAt?: Date;
  commitCount: number;
}

export type MetricEvent =
  | PullRequestCreatedEvent
  | ReviewSubmittedEvent
  | CommentPostedEvent
  | CommitObservedEvent;

export type MetricEventType = MetricEvent['type'];

export type TeamRelation = 'self' | 'same-team' | 'cross-team' | 'external';

/**
 * How an accumulator sees an event: `scope` for organization and repository
 * totals, `author` for the pull request author's own bundle, `participant` for
 * a reviewer's or commenter's bundle.
 */
export type Role = 'scope' | 'author' | 'participant';

export interface ReportingWindow {
  since: Date;
  until: Date;
}

export interface StatsContext {
  window: ReportingWindow;
}

export function windowDays(window: ReportingWindow): number {
  return (window.until.getTime() - window.since.getTime()) / (24 * 60 * 60 * 1000);
}

// Accumulator snapshots (canonical: samples sorted, maps keyed in sorted order)

export interface CodeMetricsSnapshot {
  changesPerPr: number[];
  filesChanged: number[];
  commitCounts: number[];
  reverts: number;
  hotfixes: number;
  totalAdditions: number;
  totalDeletions: number;
}

export interface CodeMetricsStats {
  pullRequests: number;
  avgChangesPerPr: number;
  p90ChangesPerPr: number;
  avgFilesChanged: number;
  avgCommits: number;
  totalChanges: number;
  reverts: number;
  hotfixes: number;
}

export interface ReviewMetricsSnapshot {
  reviewsPerformed: number;
  blockingReviewsGiven: number;
  commentsGiven: number;
  commentsReceived: number;
  timeToFirstReview: number[];
  reviewCycles: Record<PullRequestKey, number>;
  reviewersPerPr: Record<PullRequestKey, string[]>;
}

export interface ReviewMetricsStats {
  reviewsPerformed: number;
  blockingReviews: number;
  avgTimeToFirstReview: number;
  medianTimeToFirstReview: number;
  p90TimeToFirstReview: number;
  avgReviewCycles: number;
  avgReviewersPerPr: number;
  commentsGiven: number;
  commentsReceived: number;
}

export interface MergeDistribution {
  businessHours: number;
  afterHours: number;
  weekends: number;
}

export interface TimeMetricsSnapshot {
  timeToMerge: number[];
  leadTimes: number[];
  mergeDistribution: MergeDistribution;
  defaultBranchMerges: number;
}

export interface TimeMetricsStats {
  avgTimeToMerge: number;
  medianTimeToMerge: number;
  p90TimeToMerge: number;
  avgLeadTime: number;
  medianLeadTime: number;
  mergeDistribution: MergeDistribution;
  deploymentFrequency: number;
}

export interface CollaborationMetricsSnapshot {
  selfMerges: number;
  sameTeamReviews: number;
  crossTeamReviews: number;
  externalReviews: number;
  commentsPerPr: Record<PullRequestKey, number>;
  commentsByUser: Record<string, number>;
}

export interface CollaborationMetricsStats {
  selfMerges: number;
  sameTeamReviews: number;
  crossTeamReviews: number;
  externalReviews: number;
  avgCommentsPerPr: number;
  reviewParticipationRate: number;
  totalComments: number;
  activeCommenters: number;
}

export interface BottleneckMetricsSnapshot {
  stalePrs: number;
  longRunningPrs: number;
  blockedPrs: number;
  blockedByUser: Record<string, number>;
  reviewWaitTimes: number[];
  reviewResponseTimes: number[];
}

export interface BottleneckMetricsStats {
  stalePrs: number;
  longRunningPrs: number;
  blockedPrs: number;
  avgReviewWaitTime: number;
  avgReviewResponseTime: number;
  topBottleneckUsers: Array<{ login: string; count: number }>;
}

export interface MetricBundleSnapshot {
  code: CodeMetricsSnapshot;
  review: ReviewMetricsSnapshot;
  time: TimeMetricsSnapshot;
  collaboration: CollaborationMetricsSnapshot;
  bottleneck: BottleneckMetricsSnapshot;
}

export interface MetricBundleStats {
  code: CodeMetricsStats;
  review: ReviewMetricsStats;
  time: TimeMetricsStats;
  collaboration: CollaborationMetricsStats;
  bottleneck: BottleneckMetricsStats;
}

// Run results

export interface FailureRecord {
  stage: 'repository' | 'pull-request' | 'team-membership';
  repository?: string;
  pullRequest?: number;
  message: string;
  occurredAt: Date;
}

export interface LeaderboardEntry {
  login: string;
  count: number;
}

export interface OrganizationSummary {
  repositories: number;
  contributors: number;
  users: number;
  prsCreated: number;
  prsMerged: number;
  prsMergedToDefault: number;
  prsDirectToDefault: number;
  completionRate: number;
  deploymentFrequency: number;
  avgTimeToMerge: number;
  medianTimeToMerge: number;
  p90TimeToMerge: number;
  avgTimeToFirstReview: number;
  p90TimeToFirstReview: number;
  avgLeadTime: number;
  topBottleneckUsers: LeaderboardEntry[];
  topReviewers: LeaderboardEntry[];
  topContributors: LeaderboardEntry[];
  failedTasks: number;
  degraded: boolean;
}
