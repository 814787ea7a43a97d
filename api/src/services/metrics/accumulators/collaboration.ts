import type {
  CollaborationMetricsSnapshot,
  CollaborationMetricsStats,
  MetricEvent,
  PullRequestKey,
  Role,
} from '../../../types/metrics.js';
import { addCounts, increment, ratio, sortedRecord, sum } from '../stats.js';
import type { Accumulator } from './accumulator.js';

export class CollaborationMetrics
  implements Accumulator<CollaborationMetrics, CollaborationMetricsSnapshot, CollaborationMetricsStats>
{
  private selfMerges = 0;
  private sameTeamReviews = 0;
  private crossTeamReviews = 0;
  private externalReviews = 0;
  private commentsPerPr = new Map<PullRequestKey, number>();
  private commentsByUser = new Map<string, number>();

  update(event: MetricEvent, role: Role = 'scope'): void {
    switch (event.type) {
      case 'pr-created':
        if (role !== 'participant' && event.mergedAt && event.mergedBy === event.author) {
          this.selfMerges++;
        }
        return;

      case 'review-submitted':
        if (role === 'author' || event.reviewer === event.author) return;
        if (event.isFirstFromReviewer) {
          if (event.teamRelation === 'same-team') this.sameTeamReviews++;
          else if (event.teamRelation === 'cross-team') this.crossTeamReviews++;
          else if (event.teamRelation === 'external') this.externalReviews++;
        }
        if (event.hasBody) {
          increment(this.commentsPerPr, event.key);
          increment(this.commentsByUser, event.reviewer);
        }
        return;

      case 'comment-posted':
        if (role === 'author' || event.commenter === event.author) return;
        increment(this.commentsPerPr, event.key);
        increment(this.commentsByUser, event.commenter);
        return;

      default:
        return;
    }
  }

  merge(other: CollaborationMetrics): void {
    this.selfMerges += other.selfMerges;
    this.sameTeamReviews += other.sameTeamReviews;
    this.crossTeamReviews += other.crossTeamReviews;
    this.externalReviews += other.externalReviews;
    addCounts(this.commentsPerPr, other.commentsPerPr);
    addCounts(this.commentsByUser, other.commentsByUser);
  }

  snapshot(): CollaborationMetricsSnapshot {
    return {
      selfMerges: this.selfMerges,
      sameTeamReviews: this.sameTeamReviews,
      crossTeamReviews: this.crossTeamReviews,
      externalReviews: this.externalReviews,
      commentsPerPr: sortedRecord(this.commentsPerPr, (count) => count),
      commentsByUser: sortedRecord(this.commentsByUser, (count) => count),
    };
  }

  stats(): CollaborationMetricsStats {
    const reviews = this.sameTeamReviews + this.crossTeamReviews + this.externalReviews;
    const totalComments = sum([...this.commentsPerPr.values()]);
    return {
      selfMerges: this.selfMerges,
      sameTeamReviews: this.sameTeamReviews,
      crossTeamReviews: this.crossTeamReviews,
      externalReviews: this.externalReviews,
      avgCommentsPerPr: ratio(totalComments, this.commentsPerPr.size),
      reviewParticipationRate: ratio(reviews, reviews + this.selfMerges),
      totalComments,
      activeCommenters: this.commentsByUser.size,
    };
  }
}
