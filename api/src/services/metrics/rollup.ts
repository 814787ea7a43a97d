import type { LeaderboardEntry, OrganizationSummary, ReportingWindow } from '../../types/metrics.js';
import type { Organization } from './entities.js';
import { ratio, topEntries } from './stats.js';

const LEADERBOARD_SIZE = 5;

function leaderboard(counts: Map<string, number>): LeaderboardEntry[] {
  return topEntries(
    new Map([...counts].filter(([, count]) => count > 0)),
    LEADERBOARD_SIZE
  );
}

/**
 * Merges every repository's accumulators into the organization's and derives
 * the summary. Runs after every repository task has settled.
 *
 * The organization is finalized afterwards: calling this again returns the
 * same summary without merging a second time.
 */
export function rollup(org: Organization, window: ReportingWindow): OrganizationSummary {
  const existing = org.finalSummary;
  if (existing) {
    return existing;
  }

  let created = 0;
  let merged = 0;
  let mergedToDefault = 0;
  let directToDefault = 0;
  const contributors = new Set<string>();

  for (const repository of org.repositories.values()) {
    org.metrics.merge(repository.metrics);
    created += repository.counts.created;
    merged += repository.counts.merged;
    mergedToDefault += repository.counts.mergedToDefault;
    directToDefault += repository.counts.directToDefault;
    for (const login of repository.contributors) {
      contributors.add(login);
    }
  }

  const reviews = new Map<string, number>();
  const authored = new Map<string, number>();
  for (const user of org.users.values()) {
    reviews.set(user.username, user.metrics.review.reviewCount);
    authored.set(user.username, user.counts.created);
  }

  const context = { window };
  const time = org.metrics.time.stats(context);
  const review = org.metrics.review.stats();

  const summary: OrganizationSummary = {
    repositories: org.repositories.size,
    contributors: contributors.size,
    users: org.users.size,
    prsCreated: created,
    prsMerged: merged,
    prsMergedToDefault: mergedToDefault,
    prsDirectToDefault: directToDefault,
    completionRate: ratio(merged, created),
    deploymentFrequency: time.deploymentFrequency,
    avgTimeToMerge: time.avgTimeToMerge,
    medianTimeToMerge: time.medianTimeToMerge,
    p90TimeToMerge: time.p90TimeToMerge,
    avgTimeToFirstReview: review.avgTimeToFirstReview,
    p90TimeToFirstReview: review.p90TimeToFirstReview,
    avgLeadTime: time.avgLeadTime,
    topBottleneckUsers: org.metrics.bottleneck.topBottleneckUsers(LEADERBOARD_SIZE),
    topReviewers: leaderboard(reviews),
    topContributors: leaderboard(authored),
    failedTasks: org.failures.length,
    degraded: org.degraded,
  };

  org.finalize(summary);
  return summary;
}
