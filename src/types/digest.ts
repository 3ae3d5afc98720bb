/**
 * Digest data types
 *
 * Everything that flows between the pipeline stages. Values are produced
 * once per run and never mutated afterwards.
 */

/** An analytics project, as discovered or configured. */
export interface Project {
  readonly id: string;
  readonly name: string;
  /** Explicit event list from configuration. Absent means auto-discover. */
  readonly customEvents?: readonly string[];
  /** Discord colour (24-bit integer) picking the project's marker. Absent means by position. */
  readonly color?: number;
}

/** A half-open interval [start, end) in ISO 8601. */
export interface MetricWindow {
  readonly start: string;
  readonly end: string;
}

export interface ComparisonWindows {
  readonly current: MetricWindow;
  readonly baseline: MetricWindow;
  /** How far back the baseline is shifted, in days. */
  readonly offsetDays: number;
}

export interface PageCount {
  readonly path: string;
  readonly count: number;
}

export interface EventCount {
  readonly name: string;
  readonly count: number;
}

/** Metric values for one project over one window. */
export interface MetricSnapshot {
  readonly projectId: string;
  readonly window: MetricWindow;
  readonly dau: number;
  readonly wau: number;
  readonly mau: number;
  readonly pageviews: number;
  readonly topPages: readonly PageCount[];
  readonly customEvents: readonly EventCount[];
}

export type MetricName = 'dau' | 'wau' | 'mau' | 'pageviews';

/** Metrics that can be summed across projects. */
export type SummaryMetric = 'dau' | 'pageviews';

export type Direction = 'up' | 'down' | 'flat';

export interface Comparison {
  readonly metric: string;
  readonly current: number;
  readonly previous: number;
  /** Unrounded percentage change; null when the baseline is zero and current is not. */
  readonly deltaPct: number | null;
  readonly direction: Direction;
}

export interface SnapshotPair {
  readonly current: MetricSnapshot;
  readonly baseline: MetricSnapshot;
}

export interface ProjectDigest {
  readonly project: Project;
  readonly snapshot: MetricSnapshot;
  readonly comparisons: Readonly<Record<MetricName, Comparison>>;
  /** One comparison per custom event, in the snapshot's ranked order. */
  readonly events: readonly Comparison[];
}

export interface OmittedProject {
  readonly project: Project;
  readonly reason: string;
}

export interface DigestReport {
  readonly generatedAt: string;
  readonly offsetDays: number;
  readonly summary: Readonly<Record<SummaryMetric, Comparison>>;
  readonly projects: readonly ProjectDigest[];
  readonly omitted: readonly OmittedProject[];
}
