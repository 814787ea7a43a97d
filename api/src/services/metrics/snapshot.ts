import { mkdir, readFile, readdir, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type {
  FailureRecord,
  MetricBundleSnapshot,
  MetricBundleStats,
  OrganizationSummary,
  ReportingWindow,
} from '../../types/metrics.js';
import type { Organization, RepositorySnapshot, RunMode, UserSnapshot } from './entities.js';

export const SNAPSHOT_PREFIX = 'prflow-';

export interface OrganizationSnapshot {
  organization: string;
  mode: RunMode;
  generatedAt: string;
  window: {
    since: string;
    until: string;
  };
  summary: OrganizationSummary;
  failures: Array<Omit<FailureRecord, 'occurredAt'> & { occurredAt: string }>;
  metrics: MetricBundleSnapshot;
  stats: MetricBundleStats;
  repositories: Record<string, RepositorySnapshot>;
  users: Record<string, UserSnapshot>;
  teams: Record<string, string[]>;
}

function byKey<T>(entries: Iterable<[string, T]>): Record<string, T> {
  const record: Record<string, T> = {};
  for (const [key, value] of [...entries].sort(([a], [b]) => a.localeCompare(b))) {
    record[key] = value;
  }
  return record;
}

export function toSnapshot(
  org: Organization,
  summary: OrganizationSummary,
  window: ReportingWindow,
  generatedAt: Date = new Date()
): OrganizationSnapshot {
  return {
    organization: org.name,
    mode: org.mode,
    generatedAt: generatedAt.toISOString(),
    window: {
      since: window.since.toISOString(),
      until: window.until.toISOString(),
    },
    summary,
    failures: org.failures.map((failure) => ({ ...failure, occurredAt: failure.occurredAt.toISOString() })),
    metrics: org.metrics.snapshot(),
    stats: org.metrics.stats({ window }),
    repositories: byKey([...org.repositories].map(([name, repository]) => [name, repository.toJSON()])),
    users: byKey([...org.users].map(([login, user]) => [login, user.toJSON()])),
    teams: byKey([...org.teams].map(([slug, members]) => [slug, [...members].sort()])),
  };
}

/** `prflow-<timestamp>.json`; later runs in the same millisecond get `-1`, `-2`, ... */
export function snapshotFileName(generatedAt: string, sequence = 0): string {
  const stem = `${SNAPSHOT_PREFIX}${generatedAt.replace(/[:.]/g, '-')}`;
  return sequence > 0 ? `${stem}-${sequence}.json` : `${stem}.json`;
}

const MAX_SEQUENCE = 1000;

function hasCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}

/** Writes the snapshot once, never over an existing file, and returns the file path. */
export async function writeSnapshot(snapshot: OrganizationSnapshot, dir: string = tmpdir()): Promise<string> {
  await mkdir(dir, { recursive: true });
  const body = JSON.stringify(snapshot, null, 2);

  for (let sequence = 0; ; sequence++) {
    const path = join(dir, snapshotFileName(snapshot.generatedAt, sequence));
    try {
      await writeFile(path, body, { encoding: 'utf8', flag: 'wx' });
      return path;
    } catch (error) {
      if (!hasCode(error, 'EEXIST') || sequence >= MAX_SEQUENCE) {
        throw error;
      }
    }
  }
}

function snapshotStem(name: string): string {
  return name.slice(0, -'.json'.length);
}

/** Newest snapshot in `dir`, or undefined when none has been written. */
export async function readLatestSnapshot(
  dir: string = tmpdir()
): Promise<{ path: string; snapshot: OrganizationSnapshot } | undefined> {
  let names: string[];
  try {
    names = await readdir(dir);
  } catch (error) {
    if (hasCode(error, 'ENOENT')) {
      return undefined;
    }
    throw error;
  }

  // ISO timestamps sort chronologically; a numeric compare puts `-2` after `-1` and after the bare name
  const latest = names
    .filter((name) => name.startsWith(SNAPSHOT_PREFIX) && name.endsWith('.json'))
    .sort((a, b) => snapshotStem(a).localeCompare(snapshotStem(b), 'en', { numeric: true }))
    .pop();
  if (!latest) {
    return undefined;
  }

  const path = join(dir, latest);
  const snapshot: OrganizationSnapshot = JSON.parse(await readFile(path, 'utf8'));
  return { path, snapshot };
}
