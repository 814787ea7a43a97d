import type { ReportingWindow } from '../types/metrics.js';

const DAY_MS = 24 * 60 * 60 * 1000;
export const DEFAULT_WINDOW_DAYS = 7;

export function startOfUtcDay(date: Date): Date {
  return new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()));
}

export function endOfUtcDay(date: Date): Date {
  return new Date(startOfUtcDay(date).getTime() + DAY_MS - 1);
}

export interface WindowOptions {
  since?: Date;
  until?: Date;
  /** Days before `until` when `since` is not given. */
  days?: number;
}

/**
 * Whole UTC days: `since` at 00:00:00.000, `until` at 23:59:59.999. Defaults
 * to the last seven days up to `now`.
 */
export function resolveWindow(options: WindowOptions = {}, now: Date = new Date()): ReportingWindow {
  const end = options.until ?? now;
  const start = options.since ?? new Date(end.getTime() - (options.days ?? DEFAULT_WINDOW_DAYS) * DAY_MS);
  const window = { since: startOfUtcDay(start), until: endOfUtcDay(end) };

  if (window.since > window.until) {
    throw new RangeError(`Window start ${window.since.toISOString()} is after its end ${window.until.toISOString()}`);
  }
  return window;
}
