/**
 * Digest Formatter
 *
 * Renders a DigestReport as Discord-flavoured Markdown.
 * Synchronous and deterministic — the same report always yields the same
 * text. No clock, no I/O; the date comes from the report.
 */

import { formatComparison, formatNumber } from '../insights/trend-calculator.js';
import type {
  Comparison,
  DigestReport,
  MetricName,
  OmittedProject,
  PageCount,
  ProjectDigest,
} from '../types/digest.js';

const RULE = '─'.repeat(30);
const PROJECT_MARKERS = ['🔵', '🟣', '🟡', '🟢', '🟠'];
/** Discord embed colours a configured project may name. */
const COLOR_MARKERS = new Map<number, string>([
  [3447003, '🔵'],
  [10181046, '🟣'],
  [15844367, '🟡'],
  [3066993, '🟢'],
  [15105570, '🟠'],
  [15158332, '🔴'],
]);
const UNKNOWN_COLOR_MARKER = '⚪';
const MAX_PATH_LENGTH = 40;
const MAX_REASON_LENGTH = 100;

const METRIC_LABELS: Record<MetricName, string> = {
  dau: 'DAU',
  wau: 'WAU',
  mau: 'MAU',
  pageviews: 'Pageviews',
};

/**
 * Format the full digest.
 * Structured as: Header / Summary / one block per project / Omitted
 */
export function formatDigest(report: DigestReport): string {
  const lines: string[] = [];
  lines.push(`📈 **Daily Analytics Digest** - ${report.generatedAt.slice(0, 10)}`);
  lines.push(`_${comparisonLabel(report.offsetDays)} (vs ${report.offsetDays} days ago)_`);
  lines.push('');

  // ── Summary ──
  if (report.projects.length > 0) {
    lines.push('📊 **Summary (All Projects)**');
    lines.push(`Total DAU: ${formatComparison(report.summary.dau)}`);
    lines.push(`Total Pageviews: ${formatComparison(report.summary.pageviews)}`);
    lines.push('');
  }

  // ── Projects ──
  report.projects.forEach((digest, index) => {
    lines.push(RULE);
    lines.push(...formatProjectSection(digest, index));
  });

  // ── Omitted ──
  if (report.omitted.length > 0) {
    lines.push(RULE);
    lines.push(...formatOmitted(report.omitted));
  }

  lines.push(RULE);
  return lines.join('\n');
}

export function formatProjectSection(digest: ProjectDigest, index: number): string[] {
  const marker = projectMarker(digest.project.color, index);
  const { comparisons } = digest;

  const lines = [
    `${marker} **${digest.project.name}**`,
    '',
    metricLine('dau', comparisons.dau),
    metricLine('wau', comparisons.wau),
    metricLine('mau', comparisons.mau),
    '',
    metricLine('pageviews', comparisons.pageviews),
  ];

  if (digest.snapshot.topPages.length > 0) {
    lines.push('');
    lines.push('Top Pages:');
    for (const page of digest.snapshot.topPages) {
      lines.push(formatPageLine(page));
    }
  }

  if (digest.events.length > 0) {
    lines.push('');
    lines.push('Custom Events:');
    for (const event of digest.events) {
      lines.push(`  ${event.metric}: ${formatComparison(event)}`);
    }
  }

  return lines;
}

function projectMarker(color: number | undefined, index: number): string {
  if (color !== undefined) return COLOR_MARKERS.get(color) ?? UNKNOWN_COLOR_MARKER;
  return PROJECT_MARKERS[index % PROJECT_MARKERS.length] ?? UNKNOWN_COLOR_MARKER;
}

function formatOmitted(omitted: readonly OmittedProject[]): string[] {
  const count = omitted.length;
  const lines = [`⚠️ ${count} project${count === 1 ? '' : 's'} omitted`];
  for (const { project, reason } of omitted) {
    lines.push(`  ${project.name}: ${truncate(reason, MAX_REASON_LENGTH)}`);
  }
  return lines;
}

function metricLine(metric: MetricName, comparison: Comparison): string {
  return `${METRIC_LABELS[metric]}: ${formatComparison(comparison)}`;
}

function formatPageLine(page: PageCount): string {
  return `  ${truncate(page.path, MAX_PATH_LENGTH)} → ${formatNumber(page.count)}`;
}

function comparisonLabel(offsetDays: number): string {
  return offsetDays === 7 ? 'Week-over-week comparison' : 'Period-over-period comparison';
}

/** Cut by code points so an emoji is never split in half. */
function truncate(text: string, max: number): string {
  const chars = Array.from(text);
  return chars.length <= max ? text : `${chars.slice(0, max - 3).join('')}...`;
}
