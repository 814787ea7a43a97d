import { GitHubAPIError, GitHubAuthError, GitHubRateLimitError } from '../../types/github.js';
import { errorMessage } from '../../types/errors.js';
import { getLogger, type Logger } from '../../utils/logger.js';

export type FailureClass = 'auth' | 'rate-limit' | 'rate-limit-warning' | 'transient' | 'other';

export interface Classification {
  kind: FailureClass;
  /** Only set for `rate-limit`: when the quota refills. */
  resetAt?: Date;
}

export interface RetryPolicy {
  /** Total attempts, the first call included. */
  maxAttempts: number;
  baseDelayMs: number;
  /** Added to the wait when sleeping until a rate-limit reset. */
  rateLimitBufferMs: number;
  classify: (error: unknown) => Classification;
  sleep: (ms: number) => Promise<void>;
  now: () => number;
}

export interface RetryContext {
  /** Names the remote call in log records. */
  label: string;
  logger?: Logger;
}

const NETWORK_ERROR_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ETIMEDOUT',
  'EAI_AGAIN',
  'ENOTFOUND',
  'EPIPE',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_SOCKET',
]);

function hasErrorCode(error: unknown): error is { code: string } {
  return typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string';
}

export function classifyError(error: unknown): Classification {
  if (error instanceof GitHubAuthError) {
    return { kind: 'auth' };
  }

  if (error instanceof GitHubAPIError) {
    if (error.statusCode === 401) {
      return { kind: 'auth' };
    }
    if (error instanceof GitHubRateLimitError || error.rateLimitRemaining === 0) {
      return { kind: 'rate-limit', resetAt: error.rateLimitReset };
    }
    if (error.statusCode === 403 || error.statusCode === 429) {
      return { kind: 'rate-limit-warning' };
    }
    if (error.statusCode === undefined || error.statusCode >= 500) {
      return { kind: 'transient' };
    }
    return { kind: 'other' };
  }

  if (hasErrorCode(error) && NETWORK_ERROR_CODES.has(error.code)) {
    return { kind: 'transient' };
  }
  if (error instanceof TypeError && error.message === 'fetch failed') {
    return { kind: 'transient' };
  }

  return { kind: 'other' };
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 2000,
  rateLimitBufferMs: 500,
  classify: classifyError,
  sleep,
  now: () => Date.now(),
};

export function createRetryPolicy(overrides: Partial<RetryPolicy> = {}): RetryPolicy {
  const policy = { ...DEFAULT_RETRY_POLICY, ...overrides };
  if (!Number.isInteger(policy.maxAttempts) || policy.maxAttempts < 1) {
    throw new RangeError(`maxAttempts must be a positive integer, got ${policy.maxAttempts}`);
  }
  return policy;
}

export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  return policy.baseDelayMs * 2 ** (attempt - 1);
}

/**
 * How long to wait before the next attempt. Rate-limit exhaustion waits for
 * the reset (plus buffer); everything else backs off exponentially.
 */
export function retryDelay(policy: RetryPolicy, classification: Classification, attempt: number): number {
  if (classification.kind === 'rate-limit' && classification.resetAt) {
    const untilReset = Math.max(classification.resetAt.getTime() - policy.now(), 0);
    return untilReset + policy.rateLimitBufferMs;
  }
  return backoffDelay(policy, attempt);
}

/**
 * Executes `operation`, retrying failures according to `policy`.
 * Authentication failures are rethrown at once; after `maxAttempts` the last
 * error is rethrown.
 */
export async function executeWithPolicy<T>(
  operation: () => Promise<T>,
  policy: RetryPolicy = DEFAULT_RETRY_POLICY,
  context: RetryContext = { label: 'github call' }
): Promise<T> {
  const logger = context.logger ?? getLogger();

  for (let attempt = 1; ; attempt++) {
    try {
      return await operation();
    } catch (error) {
      const classification = policy.classify(error);

      if (classification.kind === 'auth') {
        logger.error({ call: context.label, err: error }, 'GitHub authentication failed; not retrying');
        throw error;
      }

      if (attempt >= policy.maxAttempts) {
        logger.error(
          { call: context.label, attempts: attempt, kind: classification.kind },
          `GitHub call failed after ${attempt} attempts: ${errorMessage(error)}`
        );
        throw error;
      }

      const delay = retryDelay(policy, classification, attempt);
      logger.warn(
        { call: context.label, attempt, kind: classification.kind, delayMs: delay },
        classification.kind === 'rate-limit'
          ? `Rate limit exceeded. Waiting ${delay}ms until reset`
          : `Retrying in ${delay}ms: ${errorMessage(error)}`
      );
      await policy.sleep(delay);
    }
  }
}
