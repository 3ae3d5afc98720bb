/**
 * Trend Calculator
 *
 * Pure functions to compare a current value against its baseline.
 * No I/O — all data passed in, results returned.
 *
 * Zero-baseline policy: when the baseline is 0 and the current value is
 * positive there is no meaningful percentage. The comparison carries
 * `deltaPct: null`, direction `up`, and is presented as the absolute
 * increase ("+5 new").
 */

import type { Comparison, Direction, MetricName, MetricSnapshot } from '../types/digest.js';

export function compare(metric: string, current: number, previous: number): Comparison {
  let deltaPct: number | null;
  if (previous > 0) {
    deltaPct = ((current - previous) / previous) * 100;
  } else if (current === previous) {
    deltaPct = 0;
  } else {
    deltaPct = null;
  }

  return { metric, current, previous, deltaPct, direction: directionOf(current, previous, deltaPct) };
}

function directionOf(current: number, previous: number, deltaPct: number | null): Direction {
  if (deltaPct === null) return current > previous ? 'up' : 'down';
  if (deltaPct > 0) return 'up';
  if (deltaPct < 0) return 'down';
  return 'flat';
}

const INDICATORS: Record<Direction, string> = {
  up: '↑',
  down: '↓',
  flat: '↔',
};

export function directionIndicator(direction: Direction): string {
  return INDICATORS[direction];
}

/**
 * Display form of the change, one decimal place.
 * `+25.0%`, `-20.0%`, `0.0%`, or `+5 new` for a zero baseline.
 */
export function formatDelta(comparison: Comparison): string {
  if (comparison.deltaPct === null) {
    const diff = comparison.current - comparison.previous;
    return `${diff > 0 ? '+' : ''}${formatNumber(diff)} new`;
  }

  const rounded = Math.round(comparison.deltaPct * 10) / 10;
  // -0.04 rounds to -0; show it as an unsigned zero
  if (rounded === 0) return '0.0%';
  return `${rounded > 0 ? '+' : ''}${rounded.toFixed(1)}%`;
}

/** `1,234 ↑ +25.0%` */
export function formatComparison(comparison: Comparison): string {
  return `${formatNumber(comparison.current)} ${directionIndicator(comparison.direction)} ${formatDelta(comparison)}`;
}

export function formatNumber(n: number): string {
  return n.toLocaleString('en-US');
}

/**
 * Compare every core metric and every custom event of two snapshots.
 * Events follow the current snapshot's order; an event missing from the
 * baseline compares against 0.
 */
export function compareSnapshots(
  current: MetricSnapshot,
  baseline: MetricSnapshot
): { comparisons: Record<MetricName, Comparison>; events: Comparison[] } {
  const comparisons = {
    dau: compare('dau', current.dau, baseline.dau),
    wau: compare('wau', current.wau, baseline.wau),
    mau: compare('mau', current.mau, baseline.mau),
    pageviews: compare('pageviews', current.pageviews, baseline.pageviews),
  } satisfies Record<MetricName, Comparison>;

  const baselineEvents = new Map(baseline.customEvents.map((e) => [e.name, e.count] as const));
  const events = current.customEvents.map((e) =>
    compare(e.name, e.count, baselineEvents.get(e.name) ?? 0)
  );

  return { comparisons, events };
}
