import type {
  BottleneckMetricsSnapshot,
  BottleneckMetricsStats,
  MetricEvent,
  Role,
} from '../../../types/metrics.js';
import { addCounts, hoursBetween, increment, mean, sortNumbers, sortedRecord, topEntries } from '../stats.js';
import type { Accumulator } from './accumulator.js';

export const STALE_AFTER_HOURS = 168;
export const LONG_RUNNING_AFTER_HOURS = 336;
const BLOCKING_LABELS = new Set(['blocked', 'on hold']);
const TOP_USERS = 5;

export class BottleneckMetrics
  implements Accumulator<BottleneckMetrics, BottleneckMetricsSnapshot, BottleneckMetricsStats>
{
  private stalePrs = 0;
  private longRunningPrs = 0;
  private blockedPrs = 0;
  private blockedByUser = new Map<string, number>();
  private reviewWaitTimes: number[] = [];
  private reviewResponseTimes: number[] = [];

  update(event: MetricEvent, role: Role = 'scope'): void {
    switch (event.type) {
      case 'pr-created': {
        if (role === 'participant' || event.state !== 'open') return;

        const age = hoursBetween(event.createdAt, event.observedAt);
        if (age > STALE_AFTER_HOURS) {
          this.stalePrs++;
        }
        if (age > LONG_RUNNING_AFTER_HOURS) {
          this.longRunningPrs++;
        }
        if (event.labels.some((label) => BLOCKING_LABELS.has(label.toLowerCase()))) {
          this.blockedPrs++;
          increment(this.blockedByUser, event.author);
        }
        return;
      }

      case 'review-submitted': {
        const elapsed = hoursBetween(event.prCreatedAt, event.submittedAt);
        if (role !== 'author' && event.reviewer !== event.author) {
          this.reviewResponseTimes.push(elapsed);
        }
        if (role !== 'participant' && event.isFirstReview) {
          this.reviewWaitTimes.push(elapsed);
        }
        return;
      }

      default:
        return;
    }
  }

  merge(other: BottleneckMetrics): void {
    this.stalePrs += other.stalePrs;
    this.longRunningPrs += other.longRunningPrs;
    this.blockedPrs += other.blockedPrs;
    addCounts(this.blockedByUser, other.blockedByUser);
    this.reviewWaitTimes.push(...other.reviewWaitTimes);
    this.reviewResponseTimes.push(...other.reviewResponseTimes);
  }

  snapshot(): BottleneckMetricsSnapshot {
    return {
      stalePrs: this.stalePrs,
      longRunningPrs: this.longRunningPrs,
      blockedPrs: this.blockedPrs,
      blockedByUser: sortedRecord(this.blockedByUser, (count) => count),
      reviewWaitTimes: sortNumbers(this.reviewWaitTimes),
      reviewResponseTimes: sortNumbers(this.reviewResponseTimes),
    };
  }

  stats(): BottleneckMetricsStats {
    return {
      stalePrs: this.stalePrs,
      longRunningPrs: this.longRunningPrs,
      blockedPrs: this.blockedPrs,
      avgReviewWaitTime: mean(this.reviewWaitTimes),
      avgReviewResponseTime: mean(this.reviewResponseTimes),
      topBottleneckUsers: topEntries(this.blockedByUser, TOP_USERS),
    };
  }

  topBottleneckUsers(limit: number = TOP_USERS): Array<{ login: string; count: number }> {
    return topEntries(this.blockedByUser, limit);
  }
}
