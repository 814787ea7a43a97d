#!/usr/bin/env node
/**
 * `prflow` CLI
 *
 * Commands:
 *   prflow review   - Run one review and write its snapshot to a scratch file
 *   prflow serve    - Start the HTTP API
 */

import { realpathSync } from 'node:fs';
import { pathToFileURL } from 'node:url';
import { Command, InvalidArgumentError } from 'commander';
import { loadConfig, type AppConfig } from './config/index.js';
import { createReviewService, type ReviewResult } from './services/review.js';
import type { ReviewRequest } from './services/engine/scheduler.js';
import { startServer } from './server.js';
import { errorMessage } from './types/errors.js';
import type { OrganizationSummary } from './types/metrics.js';
import { createLogger, setLogger } from './utils/logger.js';
import { resolveWindow } from './utils/window.js';

export interface ReviewOptions {
  org?: string;
  user?: string;
  team?: string;
  since?: Date;
  until?: Date;
  repo?: string[];
  json?: boolean;
}

export function parseDate(value: string): Date {
  const date = new Date(value);
  if (Number.isNaN(date.getTime())) {
    throw new InvalidArgumentError(`"${value}" is not a date (expected YYYY-MM-DD)`);
  }
  return date;
}

function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

export function toReviewRequest(options: ReviewOptions, config: AppConfig, now: Date = new Date()): ReviewRequest {
  const organization = options.org ?? config.github.organization;
  if (!organization && !options.user) {
    throw new InvalidArgumentError('Pass --org or --user, or set GITHUB_ORG');
  }
  return {
    organization,
    user: options.user,
    team: options.team,
    window: resolveWindow({ since: options.since, until: options.until }, now),
    repositories: options.repo,
  };
}

const hours = (value: number) => `${value.toFixed(1)}h`;
const percent = (value: number) => `${(value * 100).toFixed(1)}%`;

export function formatSummary(summary: OrganizationSummary): string[] {
  const lines = [
    `Repositories:           ${summary.repositories}`,
    `Contributors:           ${summary.contributors}`,
    `PRs created / merged:   ${summary.prsCreated} / ${summary.prsMerged}`,
    `Merged to default:      ${summary.prsMergedToDefault} (${summary.prsDirectToDefault} without review)`,
    `Completion rate:        ${percent(summary.completionRate)}`,
    `Deployment frequency:   ${summary.deploymentFrequency.toFixed(2)}/day`,
    `Time to merge:          avg ${hours(summary.avgTimeToMerge)}, median ${hours(summary.medianTimeToMerge)}, p90 ${hours(summary.p90TimeToMerge)}`,
    `Time to first review:   avg ${hours(summary.avgTimeToFirstReview)}, p90 ${hours(summary.p90TimeToFirstReview)}`,
    `Lead time:              avg ${hours(summary.avgLeadTime)}`,
  ];
  if (summary.topReviewers.length > 0) {
    lines.push(`Top reviewers:          ${summary.topReviewers.map((entry) => `${entry.login} (${entry.count})`).join(', ')}`);
  }
  if (summary.topBottleneckUsers.length > 0) {
    lines.push(
      `Blocked PRs by author:  ${summary.topBottleneckUsers.map((entry) => `${entry.login} (${entry.count})`).join(', ')}`
    );
  }
  if (summary.degraded) {
    lines.push(`Incomplete:             ${summary.failedTasks} task(s) failed, see the snapshot's failures`);
  }
  return lines;
}

function printResult(result: ReviewResult, json: boolean): void {
  if (json) {
    console.log(JSON.stringify({ path: result.path, summary: result.summary }, null, 2));
    return;
  }
  const { since, until } = result.snapshot.window;
  console.log(`\n${result.organization.name}: ${since.slice(0, 10)} to ${until.slice(0, 10)}\n`);
  for (const line of formatSummary(result.summary)) {
    console.log(`  ${line}`);
  }
  console.log(`\nSnapshot written to ${result.path}`);
}

export const reviewCommand = new Command('review')
  .description('Review pull request flow for an organization or user')
  .option('-o, --org <org>', 'GitHub organization (defaults to GITHUB_ORG)')
  .option('-u, --user <login>', 'Only pull requests by this user; with no organization set, the user\'s own repositories')
  .option('-t, --team <team>', 'Only pull requests by members of this team (name or slug)')
  .option('-s, --since <date>', 'Start date, YYYY-MM-DD (default: 7 days ago)', parseDate)
  .option('--until <date>', 'End date, YYYY-MM-DD (default: today)', parseDate)
  .option('-r, --repo <name>', 'Limit to a repository (repeatable)', collect)
  .option('--json', 'Print the summary as JSON')
  .action(async (options: ReviewOptions) => {
    const config = loadConfig();
    const logger = createLogger(config.logging);
    setLogger(logger);

    const service = createReviewService(config, logger);
    try {
      const result = await service.run(toReviewRequest(options, config));
      printResult(result, options.json ?? false);
    } catch (error) {
      console.error(`Review failed: ${errorMessage(error)}`);
      process.exitCode = 1;
    } finally {
      await service.shutdown();
    }
  });

export const serveCommand = new Command('serve')
  .description('Start the HTTP API')
  .action(async () => {
    await startServer();
  });

export const program = new Command()
  .name('prflow')
  .description('Pull request flow metrics for GitHub organizations')
  .version('1.0.0');

program.addCommand(reviewCommand);
program.addCommand(serveCommand);

// npm links the bin, so compare against the resolved path
const entry = process.argv[1];
if (entry && import.meta.url === pathToFileURL(realpathSync(entry)).href) {
  program.parseAsync(process.argv).catch((error: unknown) => {
    console.error(errorMessage(error));
    process.exit(1);
  });
}
