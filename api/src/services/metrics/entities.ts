import { OrganizationFinalizedError } from '../../types/errors.js';
import type {
  FailureRecord,
  MetricBundleSnapshot,
  MetricEvent,
  OrganizationSummary,
  PullRequestCreatedEvent,
} from '../../types/metrics.js';
import { MetricBundle } from './accumulators/index.js';
import { participantOf } from './events.js';

export type RunMode = 'organization' | 'user';
export type UserRole = 'member' | 'external';

export interface PullRequestCounts {
  created: number;
  merged: number;
  mergedToDefault: number;
  directToDefault: number;
}

function emptyCounts(): PullRequestCounts {
  return { created: 0, merged: 0, mergedToDefault: 0, directToDefault: 0 };
}

function countPullRequest(counts: PullRequestCounts, event: PullRequestCreatedEvent): void {
  counts.created++;
  if (!event.mergedAt) return;
  counts.merged++;
  if (event.isDefaultBranch) {
    counts.mergedToDefault++;
    if (event.reviewerCount === 0) {
      counts.directToDefault++;
    }
  }
}

export class Repository {
  readonly metrics = new MetricBundle();
  readonly counts = emptyCounts();
  readonly contributors = new Set<string>();
  readonly teams = new Set<string>();
  lastUpdated?: Date;

  constructor(
    readonly name: string,
    public defaultBranch: string = 'main'
  ) {}

  toJSON(): RepositorySnapshot {
    return {
      name: this.name,
      defaultBranch: this.defaultBranch,
      counts: { ...this.counts },
      contributors: [...this.contributors].sort(),
      teams: [...this.teams].sort(),
      lastUpdated: this.lastUpdated?.toISOString(),
      metrics: this.metrics.snapshot(),
    };
  }
}

export class User {
  readonly metrics = new MetricBundle();
  readonly counts = emptyCounts();

  constructor(
    readonly username: string,
    public team?: string,
    public role: UserRole = team ? 'member' : 'external'
  ) {}

  toJSON(): UserSnapshot {
    return {
      username: this.username,
      team: this.team,
      role: this.role,
      counts: { ...this.counts },
      metrics: this.metrics.snapshot(),
    };
  }
}

export interface RepositorySnapshot {
  name: string;
  defaultBranch: string;
  counts: PullRequestCounts;
  contributors: string[];
  teams: string[];
  lastUpdated?: string;
  metrics: MetricBundleSnapshot;
}

export interface UserSnapshot {
  username: string;
  team?: string;
  role: UserRole;
  counts: PullRequestCounts;
  metrics: MetricBundleSnapshot;
}

const NO_TEAMS: ReadonlySet<string> = new Set();

/**
 * Root aggregate for one run. Tasks share it; map insertions and accumulator
 * updates are synchronous, so each one completes before another task runs.
 *
 * Events land on repository and user bundles only. The organization's own
 * bundle stays empty until rollup merges the repositories into it.
 */
export class Organization {
  readonly metrics = new MetricBundle();
  readonly repositories = new Map<string, Repository>();
  readonly users = new Map<string, User>();
  /** Team slug to member logins. */
  readonly teams = new Map<string, Set<string>>();
  readonly failures: FailureRecord[] = [];
  private readonly membership = new Map<string, Set<string>>();
  private summary?: OrganizationSummary;

  constructor(
    readonly name: string,
    readonly mode: RunMode = 'organization'
  ) {}

  getOrCreateRepository(name: string, defaultBranch?: string): Repository {
    let repository = this.repositories.get(name);
    if (!repository) {
      repository = new Repository(name, defaultBranch);
      this.repositories.set(name, repository);
    } else if (defaultBranch) {
      repository.defaultBranch = defaultBranch;
    }
    return repository;
  }

  getOrCreateUser(login: string, team?: string): User {
    let user = this.users.get(login);
    if (!user) {
      user = new User(login, team ?? this.primaryTeam(login));
      this.users.set(login, user);
    } else if (team && !user.team) {
      user.team = team;
      user.role = 'member';
    }
    return user;
  }

  addTeam(slug: string, members: Iterable<string>): void {
    const team = this.teams.get(slug) ?? new Set<string>();
    this.teams.set(slug, team);
    for (const login of members) {
      team.add(login);
      const teamsOfMember = this.membership.get(login) ?? new Set<string>();
      teamsOfMember.add(slug);
      this.membership.set(login, teamsOfMember);
    }
  }

  teamsOf(login: string): ReadonlySet<string> {
    return this.membership.get(login) ?? NO_TEAMS;
  }

  /**
   * Routes one event to its repository's bundle, the author's bundle and the
   * participant's bundle (reviewer or commenter), each exactly once.
   */
  apply(event: MetricEvent): void {
    if (this.isFinalized) {
      throw new OrganizationFinalizedError(this.name);
    }

    const repository = this.getOrCreateRepository(event.repository);
    const author = this.getOrCreateUser(event.author);

    repository.metrics.update(event, 'scope');
    author.metrics.update(event, 'author');
    repository.contributors.add(event.author);
    for (const team of this.teamsOf(event.author)) {
      repository.teams.add(team);
    }

    const participant = participantOf(event);
    if (participant) {
      this.getOrCreateUser(participant).metrics.update(event, 'participant');
    }

    if (event.type === 'pr-created') {
      countPullRequest(repository.counts, event);
      countPullRequest(author.counts, event);
      if (!repository.lastUpdated || event.createdAt > repository.lastUpdated) {
        repository.lastUpdated = event.createdAt;
      }
    }
  }

  recordFailure(failure: Omit<FailureRecord, 'occurredAt'> & { occurredAt?: Date }): FailureRecord {
    const record: FailureRecord = { ...failure, occurredAt: failure.occurredAt ?? new Date() };
    this.failures.push(record);
    return record;
  }

  get degraded(): boolean {
    return this.failures.length > 0;
  }

  get isFinalized(): boolean {
    return this.summary !== undefined;
  }

  /** Set once by rollup; later rollups read it back instead of merging again. */
  get finalSummary(): OrganizationSummary | undefined {
    return this.summary;
  }

  finalize(summary: OrganizationSummary): void {
    this.summary = summary;
  }

  private primaryTeam(login: string): string | undefined {
    const [first] = [...this.teamsOf(login)].sort();
    return first;
  }
}
