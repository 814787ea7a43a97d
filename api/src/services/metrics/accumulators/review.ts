import type {
  MetricEvent,
  PullRequestKey,
  ReviewMetricsSnapshot,
  ReviewMetricsStats,
  Role,
} from '../../../types/metrics.js';
import { addCounts, hoursBetween, increment, mean, median, percentile, sortNumbers, sortedRecord } from '../stats.js';
import type { Accumulator } from './accumulator.js';

export class ReviewMetrics implements Accumulator<ReviewMetrics, ReviewMetricsSnapshot, ReviewMetricsStats> {
  private reviewsPerformed = 0;
  private blockingReviewsGiven = 0;
  private commentsGiven = 0;
  private commentsReceived = 0;
  private timeToFirstReview: number[] = [];
  private reviewCycles = new Map<PullRequestKey, number>();
  // Sets, so a reviewer is counted once per pull request however often they review
  private reviewersPerPr = new Map<PullRequestKey, Set<string>>();

  update(event: MetricEvent, role: Role = 'scope'): void {
    switch (event.type) {
      case 'review-submitted': {
        // The author's own reviews (thread replies) are not review activity at any level
        const fromSomeoneElse = event.reviewer !== event.author;

        if (role !== 'author' && fromSomeoneElse) {
          this.reviewsPerformed++;
          if (event.state === 'CHANGES_REQUESTED') {
            this.blockingReviewsGiven++;
          }
          if (event.hasBody) {
            this.commentsGiven++;
          }
          this.addReviewer(event.key, event.reviewer);
        }

        if (role !== 'participant') {
          if (event.hasBody && fromSomeoneElse) {
            this.commentsReceived++;
          }
          if (event.isFirstReview) {
            this.timeToFirstReview.push(hoursBetween(event.prCreatedAt, event.submittedAt));
          }
          if (event.opensCycle) {
            increment(this.reviewCycles, event.key);
          }
        }
        return;
      }

      case 'comment-posted': {
        if (event.commenter === event.author) return;
        if (role !== 'author') {
          this.commentsGiven++;
        }
        if (role !== 'participant') {
          this.commentsReceived++;
        }
        return;
      }

      default:
        return;
    }
  }

  merge(other: ReviewMetrics): void {
    this.reviewsPerformed += other.reviewsPerformed;
    this.blockingReviewsGiven += other.blockingReviewsGiven;
    this.commentsGiven += other.commentsGiven;
    this.commentsReceived += other.commentsReceived;
    this.timeToFirstReview.push(...other.timeToFirstReview);
    addCounts(this.reviewCycles, other.reviewCycles);
    for (const [key, reviewers] of other.reviewersPerPr) {
      for (const reviewer of reviewers) {
        this.addReviewer(key, reviewer);
      }
    }
  }

  snapshot(): ReviewMetricsSnapshot {
    return {
      reviewsPerformed: this.reviewsPerformed,
      blockingReviewsGiven: this.blockingReviewsGiven,
      commentsGiven: this.commentsGiven,
      commentsReceived: this.commentsReceived,
      timeToFirstReview: sortNumbers(this.timeToFirstReview),
      reviewCycles: sortedRecord(this.reviewCycles, (cycles) => cycles),
      reviewersPerPr: sortedRecord(this.reviewersPerPr, (reviewers) => [...reviewers].sort()),
    };
  }

  stats(): ReviewMetricsStats {
    const reviewerCounts = [...this.reviewersPerPr.values()].map((reviewers) => reviewers.size);
    return {
      reviewsPerformed: this.reviewsPerformed,
      blockingReviews: this.blockingReviewsGiven,
      avgTimeToFirstReview: mean(this.timeToFirstReview),
      medianTimeToFirstReview: median(this.timeToFirstReview),
      p90TimeToFirstReview: percentile(this.timeToFirstReview, 90),
      avgReviewCycles: mean([...this.reviewCycles.values()]),
      avgReviewersPerPr: mean(reviewerCounts),
      commentsGiven: this.commentsGiven,
      commentsReceived: this.commentsReceived,
    };
  }

  get reviewCount(): number {
    return this.reviewsPerformed;
  }

  private addReviewer(key: PullRequestKey, reviewer: string): void {
    let reviewers = this.reviewersPerPr.get(key);
    if (!reviewers) {
      reviewers = new Set();
      this.reviewersPerPr.set(key, reviewers);
    }
    reviewers.add(reviewer);
  }
}
