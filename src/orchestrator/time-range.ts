/**
 * Time Window Utilities
 *
 * Pure functions to compute the metric windows for a digest run.
 * All times are in ISO 8601 format.
 */

import type { ComparisonWindows, MetricWindow } from '../types/digest.js';

const HOUR_MS = 60 * 60 * 1000;
const DAY_MS = 24 * HOUR_MS;

/**
 * Current window = the last `periodHours` ending at now.
 * Baseline window = the same window shifted back `offsetDays` days.
 * Used by: every digest run (defaults give "last 24h vs same 24h a week ago").
 */
export function comparisonWindows(
  now: Date = new Date(),
  periodHours = 24,
  offsetDays = 7
): ComparisonWindows {
  if (!(periodHours > 0)) {
    throw new RangeError(`periodHours must be positive, got ${periodHours}`);
  }
  if (!(offsetDays > 0)) {
    throw new RangeError(`offsetDays must be positive, got ${offsetDays}`);
  }

  const end = now.getTime();
  const start = end - periodHours * HOUR_MS;
  const shift = offsetDays * DAY_MS;

  return {
    current: toWindow(start, end),
    baseline: toWindow(start - shift, end - shift),
    offsetDays,
  };
}

/**
 * A window of `days` days ending where `window` ends.
 * Used for WAU (7) and MAU (30) so both windows of a comparison
 * look back the same distance.
 */
export function lookbackWindow(window: MetricWindow, days: number): MetricWindow {
  const end = new Date(window.end).getTime();
  return toWindow(end - days * DAY_MS, end);
}

export function windowDurationMs(window: MetricWindow): number {
  return new Date(window.end).getTime() - new Date(window.start).getTime();
}

function toWindow(startMs: number, endMs: number): MetricWindow {
  return {
    start: new Date(startMs).toISOString(),
    end: new Date(endMs).toISOString(),
  };
}
