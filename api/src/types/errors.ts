// Engine Error Types

export type RunStage =
  | 'resolve-root'
  | 'resolve-team'
  | 'list-repositories'
  | 'repository'
  | 'pull-request'
  | 'rollup';

/**
 * A run could not start, or could not go on. Carries the stage that failed
 * and the original error as `cause`.
 */
export class FatalRunError extends Error {
  constructor(
    public stage: RunStage,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(`[${stage}] ${message}`, options);
    this.name = 'FatalRunError';
  }
}

export class PoolClosedError extends Error {
  constructor(public pool: string) {
    super(`Work pool "${pool}" is shut down and accepts no new tasks`);
    this.name = 'PoolClosedError';
  }
}

export class OrganizationFinalizedError extends Error {
  constructor(organization: string) {
    super(`Organization "${organization}" has been rolled up; no further events can be applied`);
    this.name = 'OrganizationFinalizedError';
  }
}

export class ConfigurationError extends Error {
  constructor(
    message: string,
    public issues: string[] = []
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ConfigurationError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
