import type { MetricEvent, Role, StatsContext } from '../../../types/metrics.js';

/**
 * A mergeable bag of counters and samples for one metric dimension.
 *
 * `update` is synchronous: once called it runs to completion before any other
 * task on the event loop can touch the same instance, so every update is its
 * own critical section. `merge` folds a fully populated peer in; applying
 * events in any order and merging in any grouping gives the same snapshot.
 */
export interface Accumulator<Self, Snapshot, Stats> {
  update(event: MetricEvent, role?: Role): void;
  merge(other: Self): void;
  /** Canonical raw state: samples sorted ascending, map keys sorted. */
  snapshot(): Snapshot;
  /** Derived figures, computed on demand from the raw state. */
  stats(context: StatsContext): Stats;
}
