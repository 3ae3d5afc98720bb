/**
 * Metrics Collector
 *
 * Coordinates fetching a current and a baseline snapshot for every project.
 * Every source call goes through one shared limiter. A project that fails
 * is folded into a tagged result so it never blocks its siblings.
 */

import { discoverEvents, MAX_CUSTOM_EVENTS } from '../discovery/project-discovery.js';
import { ProjectFetchError, errorMessage } from '../errors.js';
import { logger } from '../logger.js';
import { createLimiter, DEFAULT_CONCURRENCY, type Limiter } from './limiter.js';
import { windowDurationMs } from './time-range.js';
import type {
  ComparisonWindows,
  EventCount,
  MetricSnapshot,
  MetricWindow,
  Project,
  SnapshotPair,
} from '../types/digest.js';
import type { MetricsSource } from '../types/sources.js';

export const MAX_TOP_PAGES = 5;

/** Outcome of one project's fetch, in the slot of that project. */
export type ProjectFetchResult =
  | { readonly ok: true; readonly project: Project; readonly snapshots: SnapshotPair }
  | { readonly ok: false; readonly project: Project; readonly error: ProjectFetchError };

export interface CollectOptions {
  /** Maximum in-flight analytics requests across all projects. */
  concurrency?: number;
}

/**
 * Fetch snapshots for all projects.
 * Results come back in the order of `projects`, whatever order the
 * fetches finish in.
 */
export async function collectAll(
  source: MetricsSource,
  projects: readonly Project[],
  windows: ComparisonWindows,
  options: CollectOptions = {}
): Promise<ProjectFetchResult[]> {
  if (windowDurationMs(windows.current) !== windowDurationMs(windows.baseline)) {
    throw new RangeError('Current and baseline windows must have the same duration');
  }

  const limit = createLimiter(options.concurrency ?? DEFAULT_CONCURRENCY);

  return Promise.all(
    projects.map(async (project): Promise<ProjectFetchResult> => {
      try {
        const snapshots = await collectProjectSnapshots(source, project, windows, limit);
        logger.info(
          `Fetched ${project.name}: DAU=${snapshots.current.dau}, WAU=${snapshots.current.wau}, MAU=${snapshots.current.mau}`
        );
        return { ok: true, project, snapshots };
      } catch (error) {
        logger.error(`Failed to fetch metrics for ${project.name}: ${errorMessage(error)}`);
        return {
          ok: false,
          project,
          error: new ProjectFetchError(project, errorMessage(error), { cause: error }),
        };
      }
    })
  );
}

/**
 * Fetch one project's snapshot pair.
 *
 *   1. Discover event names for the current window
 *   2. Query both windows in parallel with that same event set
 */
export async function collectProjectSnapshots(
  source: MetricsSource,
  project: Project,
  windows: ComparisonWindows,
  limit: Limiter = createLimiter()
): Promise<SnapshotPair> {
  const eventNames = await limit(() => discoverEvents(source, project, windows.current));

  const [current, baseline] = await Promise.all([
    fetchSnapshot(source, project, windows.current, eventNames, limit),
    fetchSnapshot(source, project, windows.baseline, eventNames, limit),
  ]);

  return { current, baseline };
}

/**
 * Rank by count descending, ties by label, then truncate.
 * Never mutates the input.
 */
export function rankCounts<T extends { readonly count: number }>(
  items: readonly T[],
  label: (item: T) => string,
  limit: number
): T[] {
  return [...items]
    .sort((a, b) => b.count - a.count || compareLabels(label(a), label(b)))
    .slice(0, Math.max(0, limit));
}

// ─── Internal Helpers ────────────────────────────────────────

async function fetchSnapshot(
  source: MetricsSource,
  project: Project,
  window: MetricWindow,
  eventNames: readonly string[],
  limit: Limiter
): Promise<MetricSnapshot> {
  const [dau, wau, mau, pageviews, topPages, events] = await Promise.all([
    limit(() => source.queryMetric(project.id, 'dau', window)),
    limit(() => source.queryMetric(project.id, 'wau', window)),
    limit(() => source.queryMetric(project.id, 'mau', window)),
    limit(() => source.queryMetric(project.id, 'pageviews', window)),
    limit(() => source.queryMetric(project.id, 'top_pages', window)),
    eventNames.length > 0
      ? limit(() => source.countEvents(project.id, eventNames, window))
      : Promise.resolve<EventCount[]>([]),
  ]);

  return {
    projectId: project.id,
    window,
    dau,
    wau,
    mau,
    pageviews,
    topPages: rankCounts(topPages, (p) => p.path, MAX_TOP_PAGES),
    customEvents: rankCounts(events, (e) => e.name, MAX_CUSTOM_EVENTS),
  };
}

function compareLabels(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
