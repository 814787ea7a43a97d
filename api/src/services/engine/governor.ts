/**
 * Admission governor: a counting semaphore that bounds how many GitHub calls
 * are in flight across every work pool in the process.
 *
 * The limit is independent of pool sizes because all three tiers share one
 * remote endpoint. Waiters are admitted in FIFO order; under sustained load a
 * waiter can still wait a long time, which is accepted.
 */

export type ReleaseHandle = () => void;

export interface GovernorStats {
  limit: number;
  inFlight: number;
  waiting: number;
  peakInFlight: number;
  totalAcquired: number;
}

export class AdmissionGovernor {
  private inFlightCount = 0;
  private peak = 0;
  private acquired = 0;
  private readonly waiters: Array<() => void> = [];

  constructor(public readonly limit: number = 15) {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new RangeError(`Governor limit must be a positive integer, got ${limit}`);
    }
  }

  /**
   * Resolves once a slot is free. The returned handle frees the slot; calling
   * it more than once has no further effect.
   */
  async acquire(): Promise<ReleaseHandle> {
    if (this.inFlightCount < this.limit) {
      this.admit();
    } else {
      // release() hands its slot straight to us, so inFlightCount never dips
      await new Promise<void>((resolve) => {
        this.waiters.push(resolve);
      });
    }

    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.release();
    };
  }

  /** Runs `operation` while holding a slot. */
  async run<T>(operation: () => Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await operation();
    } finally {
      release();
    }
  }

  stats(): GovernorStats {
    return {
      limit: this.limit,
      inFlight: this.inFlightCount,
      waiting: this.waiters.length,
      peakInFlight: this.peak,
      totalAcquired: this.acquired,
    };
  }

  get inFlight(): number {
    return this.inFlightCount;
  }

  get waiting(): number {
    return this.waiters.length;
  }

  get peakInFlight(): number {
    return this.peak;
  }

  resetPeak(): void {
    this.peak = this.inFlightCount;
  }

  private admit(): void {
    this.inFlightCount++;
    this.acquired++;
    if (this.inFlightCount > this.peak) {
      this.peak = this.inFlightCount;
    }
  }

  private release(): void {
    this.inFlightCount--;
    const next = this.waiters.shift();
    if (next) {
      this.admit();
      next();
    }
  }
}
