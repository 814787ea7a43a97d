import type {
  MergeDistribution,
  MetricEvent,
  Role,
  StatsContext,
  TimeMetricsSnapshot,
  TimeMetricsStats,
} from '../../../types/metrics.js';
import { windowDays } from '../../../types/metrics.js';
import { hoursBetween, mean, median, percentile, sortNumbers } from '../stats.js';
import type { Accumulator } from './accumulator.js';

export type MergeBucket = keyof MergeDistribution;

/** Weekend is Saturday/Sunday; business hours are 09:00–16:59, both in UTC. */
export function mergeBucket(mergedAt: Date): MergeBucket {
  const day = mergedAt.getUTCDay();
  if (day === 0 || day === 6) {
    return 'weekends';
  }
  const hour = mergedAt.getUTCHours();
  return hour >= 9 && hour < 17 ? 'businessHours' : 'afterHours';
}

export class TimeMetrics implements Accumulator<TimeMetrics, TimeMetricsSnapshot, TimeMetricsStats> {
  private timeToMerge: number[] = [];
  private leadTimes: number[] = [];
  private mergeDistribution: MergeDistribution = { businessHours: 0, afterHours: 0, weekends: 0 };
  private defaultBranchMerges = 0;

  update(event: MetricEvent, role: Role = 'scope'): void {
    if (role === 'participant') return;

    if (event.type === 'pr-created' && event.mergedAt) {
      this.timeToMerge.push(hoursBetween(event.createdAt, event.mergedAt));
      this.mergeDistribution[mergeBucket(event.mergedAt)]++;
      if (event.isDefaultBranch) {
        this.defaultBranchMerges++;
      }
    } else if (event.type === 'commit-observed' && event.mergedAt) {
      this.leadTimes.push(hoursBetween(event.firstCommitAt, event.mergedAt));
    }
  }

  merge(other: TimeMetrics): void {
    this.timeToMerge.push(...other.timeToMerge);
    this.leadTimes.push(...other.leadTimes);
    this.mergeDistribution.businessHours += other.mergeDistribution.businessHours;
    this.mergeDistribution.afterHours += other.mergeDistribution.afterHours;
    this.mergeDistribution.weekends += other.mergeDistribution.weekends;
    this.defaultBranchMerges += other.defaultBranchMerges;
  }

  snapshot(): TimeMetricsSnapshot {
    return {
      timeToMerge: sortNumbers(this.timeToMerge),
      leadTimes: sortNumbers(this.leadTimes),
      mergeDistribution: { ...this.mergeDistribution },
      defaultBranchMerges: this.defaultBranchMerges,
    };
  }

  /**
   * Merges into the default branch per day of the reporting window. Windows
   * shorter than a day can push this above the merge count.
   */
  deploymentFrequency(context: StatsContext): number {
    const days = windowDays(context.window);
    return days > 0 ? this.defaultBranchMerges / days : 0;
  }

  stats(context: StatsContext): TimeMetricsStats {
    return {
      avgTimeToMerge: mean(this.timeToMerge),
      medianTimeToMerge: median(this.timeToMerge),
      p90TimeToMerge: percentile(this.timeToMerge, 90),
      avgLeadTime: mean(this.leadTimes),
      medianLeadTime: median(this.leadTimes),
      mergeDistribution: { ...this.mergeDistribution },
      deploymentFrequency: this.deploymentFrequency(context),
    };
  }
}
