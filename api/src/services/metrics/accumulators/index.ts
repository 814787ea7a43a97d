import type {
  MetricBundleSnapshot,
  MetricBundleStats,
  MetricEvent,
  Role,
  StatsContext,
} from '../../../types/metrics.js';
import type { Accumulator } from './accumulator.js';
import { BottleneckMetrics } from './bottleneck.js';
import { CodeMetrics } from './code.js';
import { CollaborationMetrics } from './collaboration.js';
import { ReviewMetrics } from './review.js';
import { TimeMetrics } from './time.js';

export type { Accumulator } from './accumulator.js';
export { BottleneckMetrics, LONG_RUNNING_AFTER_HOURS, STALE_AFTER_HOURS } from './bottleneck.js';
export { CodeMetrics } from './code.js';
export { CollaborationMetrics } from './collaboration.js';
export { ReviewMetrics } from './review.js';
export { TimeMetrics, mergeBucket, type MergeBucket } from './time.js';

/** The five accumulators every entity carries, updated and merged together. */
export class MetricBundle implements Accumulator<MetricBundle, MetricBundleSnapshot, MetricBundleStats> {
  readonly code = new CodeMetrics();
  readonly review = new ReviewMetrics();
  readonly time = new TimeMetrics();
  readonly collaboration = new CollaborationMetrics();
  readonly bottleneck = new BottleneckMetrics();

  update(event: MetricEvent, role: Role = 'scope'): void {
    this.code.update(event, role);
    this.review.update(event, role);
    this.time.update(event, role);
    this.collaboration.update(event, role);
    this.bottleneck.update(event, role);
  }

  merge(other: MetricBundle): void {
    this.code.merge(other.code);
    this.review.merge(other.review);
    this.time.merge(other.time);
    this.collaboration.merge(other.collaboration);
    this.bottleneck.merge(other.bottleneck);
  }

  snapshot(): MetricBundleSnapshot {
    return {
      code: this.code.snapshot(),
      review: this.review.snapshot(),
      time: this.time.snapshot(),
      collaboration: this.collaboration.snapshot(),
      bottleneck: this.bottleneck.snapshot(),
    };
  }

  stats(context: StatsContext): MetricBundleStats {
    return {
      code: this.code.stats(),
      review: this.review.stats(),
      time: this.time.stats(context),
      collaboration: this.collaboration.stats(),
      bottleneck: this.bottleneck.stats(),
    };
  }
}
