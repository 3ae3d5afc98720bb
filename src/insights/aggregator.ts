/**
 * Aggregator
 *
 * Folds per-project results into the cross-project summary and the final
 * DigestReport. Pure function — no I/O.
 *
 * Only additive metrics are summed. Totals are built from raw current and
 * previous values and compared once; per-project percentages are never
 * averaged. WAU and MAU count overlapping user populations, so they stay
 * per-project.
 */

import { compare, compareSnapshots } from './trend-calculator.js';
import type { ProjectFetchResult } from '../orchestrator/metrics-collector.js';
import type {
  Comparison,
  DigestReport,
  OmittedProject,
  ProjectDigest,
  SummaryMetric,
} from '../types/digest.js';

export function aggregate(digests: readonly ProjectDigest[]): Record<SummaryMetric, Comparison> {
  const totals = (metric: SummaryMetric): Comparison => {
    let current = 0;
    let previous = 0;
    for (const digest of digests) {
      current += digest.comparisons[metric].current;
      previous += digest.comparisons[metric].previous;
    }
    return compare(metric, current, previous);
  };

  return {
    dau: totals('dau'),
    pageviews: totals('pageviews'),
  };
}

interface BuildReportInput {
  results: readonly ProjectFetchResult[];
  offsetDays: number;
  generatedAt: string;
}

/**
 * Build the DigestReport from collector slots.
 * Successful projects keep their slot order; failures move to `omitted`.
 */
export function buildDigestReport(input: BuildReportInput): DigestReport {
  const projects: ProjectDigest[] = [];
  const omitted: OmittedProject[] = [];

  for (const result of input.results) {
    if (result.ok) {
      const { current, baseline } = result.snapshots;
      const { comparisons, events } = compareSnapshots(current, baseline);
      projects.push({ project: result.project, snapshot: current, comparisons, events });
    } else {
      omitted.push({ project: result.project, reason: result.error.message });
    }
  }

  return {
    generatedAt: input.generatedAt,
    offsetDays: input.offsetDays,
    summary: aggregate(projects),
    projects,
    omitted,
  };
}
