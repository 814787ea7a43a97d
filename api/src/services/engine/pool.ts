import pLimit, { type LimitFunction } from 'p-limit';
import { PoolClosedError } from '../../types/errors.js';

export interface PoolStats {
  name: string;
  concurrency: number;
  active: number;
  pending: number;
  completed: number;
  failed: number;
  closed: boolean;
}

/**
 * A fixed-size async work pool. Tasks past the concurrency limit queue up;
 * `shutdown()` stops taking new tasks and waits for everything accepted so far.
 */
export class WorkPool {
  private readonly limit: LimitFunction;
  private readonly inFlight = new Set<Promise<unknown>>();
  private completedCount = 0;
  private failedCount = 0;
  private closed = false;

  constructor(
    public readonly name: string,
    public readonly concurrency: number
  ) {
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new RangeError(`Pool "${name}" concurrency must be a positive integer, got ${concurrency}`);
    }
    this.limit = pLimit(concurrency);
  }

  submit<T>(task: () => Promise<T>): Promise<T> {
    if (this.closed) {
      return Promise.reject(new PoolClosedError(this.name));
    }

    const promise = this.limit(task);
    this.inFlight.add(promise);
    promise.then(
      () => {
        this.completedCount++;
        this.inFlight.delete(promise);
      },
      () => {
        this.failedCount++;
        this.inFlight.delete(promise);
      }
    );
    return promise;
  }

  /** Waits until every accepted task has settled, including ones queued meanwhile. */
  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.allSettled([...this.inFlight]);
    }
  }

  async shutdown(): Promise<void> {
    this.closed = true;
    await this.drain();
  }

  get isClosed(): boolean {
    return this.closed;
  }

  stats(): PoolStats {
    return {
      name: this.name,
      concurrency: this.concurrency,
      active: this.limit.activeCount,
      pending: this.limit.pendingCount,
      completed: this.completedCount,
      failed: this.failedCount,
      closed: this.closed,
    };
  }
}

export interface TierSizes {
  repository: number;
  pullRequest: number;
  subResource: number;
}

export const DEFAULT_TIER_SIZES: TierSizes = {
  repository: 4,
  pullRequest: 8,
  subResource: 16,
};

/**
 * The three scheduling tiers. A task only ever waits on work queued in a
 * lower tier, never on its own, so a full tier cannot deadlock itself.
 */
export class TieredPools {
  readonly repository: WorkPool;
  readonly pullRequest: WorkPool;
  readonly subResource: WorkPool;

  constructor(sizes: TierSizes = DEFAULT_TIER_SIZES) {
    this.repository = new WorkPool('repository', sizes.repository);
    this.pullRequest = new WorkPool('pull-request', sizes.pullRequest);
    this.subResource = new WorkPool('sub-resource', sizes.subResource);
  }

  /** Sum of all tier capacities; the most calls the pools can ask for at once. */
  get capacity(): number {
    return this.repository.concurrency + this.pullRequest.concurrency + this.subResource.concurrency;
  }

  // Top tier first: its tasks are the ones still feeding the lower tiers
  async shutdown(): Promise<void> {
    await this.repository.shutdown();
    await this.pullRequest.shutdown();
    await this.subResource.shutdown();
  }

  stats(): PoolStats[] {
    return [this.repository.stats(), this.pullRequest.stats(), this.subResource.stats()];
  }
}
