import type { CodeMetricsSnapshot, CodeMetricsStats, MetricEvent, Role } from '../../../types/metrics.js';
import { mean, percentile, sortNumbers } from '../stats.js';
import type { Accumulator } from './accumulator.js';

export class CodeMetrics implements Accumulator<CodeMetrics, CodeMetricsSnapshot, CodeMetricsStats> {
  private changesPerPr: number[] = [];
  private filesChanged: number[] = [];
  private commitCounts: number[] = [];
  private reverts = 0;
  private hotfixes = 0;
  private totalAdditions = 0;
  private totalDeletions = 0;

  update(event: MetricEvent, role: Role = 'scope'): void {
    if (event.type !== 'pr-created' || role === 'participant') return;

    this.changesPerPr.push(event.additions + event.deletions);
    this.filesChanged.push(event.changedFiles);
    this.commitCounts.push(event.commitCount);
    this.totalAdditions += event.additions;
    this.totalDeletions += event.deletions;

    const title = event.title.toLowerCase();
    if (title.includes('revert')) {
      this.reverts++;
    }
    if (title.includes('hotfix') || event.labels.some((label) => label.toLowerCase() === 'hotfix')) {
      this.hotfixes++;
    }
  }

  merge(other: CodeMetrics): void {
    this.changesPerPr.push(...other.changesPerPr);
    this.filesChanged.push(...other.filesChanged);
    this.commitCounts.push(...other.commitCounts);
    this.reverts += other.reverts;
    this.hotfixes += other.hotfixes;
    this.totalAdditions += other.totalAdditions;
    this.totalDeletions += other.totalDeletions;
  }

  snapshot(): CodeMetricsSnapshot {
    return {
      changesPerPr: sortNumbers(this.changesPerPr),
      filesChanged: sortNumbers(this.filesChanged),
      commitCounts: sortNumbers(this.commitCounts),
      reverts: this.reverts,
      hotfixes: this.hotfixes,
      totalAdditions: this.totalAdditions,
      totalDeletions: this.totalDeletions,
    };
  }

  stats(): CodeMetricsStats {
    return {
      pullRequests: this.changesPerPr.length,
      avgChangesPerPr: mean(this.changesPerPr),
      p90ChangesPerPr: percentile(this.changesPerPr, 90),
      avgFilesChanged: mean(this.filesChanged),
      avgCommits: mean(this.commitCounts),
      totalChanges: this.totalAdditions + this.totalDeletions,
      reverts: this.reverts,
      hotfixes: this.hotfixes,
    };
  }
}
