const HOUR_MS = 60 * 60 * 1000;

export function hoursBetween(start: Date, end: Date): number {
  return (end.getTime() - start.getTime()) / HOUR_MS;
}

export function sum(values: readonly number[]): number {
  return values.reduce((total, value) => total + value, 0);
}

export function mean(values: readonly number[]): number {
  return values.length > 0 ? sum(values) / values.length : 0;
}

export function median(values: readonly number[]): number {
  if (values.length === 0) return 0;
  const sorted = sortNumbers(values);
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 0 ? (sorted[mid - 1] + sorted[mid]) / 2 : sorted[mid];
}

/** Nearest-rank percentile, `p` in (0, 100]. */
export function percentile(values: readonly number[], p: number): number {
  if (values.length === 0) return 0;
  const sorted = sortNumbers(values);
  const rank = Math.ceil((p / 100) * sorted.length);
  return sorted[Math.min(Math.max(rank, 1), sorted.length) - 1];
}

export function sortNumbers(values: readonly number[]): number[] {
  return [...values].sort((a, b) => a - b);
}

export function ratio(numerator: number, denominator: number): number {
  return denominator > 0 ? numerator / denominator : 0;
}

export function increment<K>(counts: Map<K, number>, key: K, by = 1): void {
  counts.set(key, (counts.get(key) ?? 0) + by);
}

export function addCounts<K>(target: Map<K, number>, source: ReadonlyMap<K, number>): void {
  for (const [key, count] of source) {
    increment(target, key, count);
  }
}

export function sortedRecord<V, R>(map: ReadonlyMap<string, V>, project: (value: V) => R): Record<string, R> {
  const record: Record<string, R> = {};
  for (const key of [...map.keys()].sort()) {
    const value = map.get(key);
    if (value !== undefined) record[key] = project(value);
  }
  return record;
}

/** Highest counts first; ties broken by login so the order is stable. */
export function topEntries(counts: ReadonlyMap<string, number>, limit: number): Array<{ login: string; count: number }> {
  return [...counts.entries()]
    .sort(([loginA, countA], [loginB, countB]) => countB - countA || loginA.localeCompare(loginB))
    .slice(0, limit)
    .map(([login, count]) => ({ login, count }));
}
