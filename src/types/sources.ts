/**
 * Collaborator contracts
 *
 * The analytics provider and the chat provider sit behind these
 * interfaces so the pipeline can run against in-process fakes.
 */

import type { EventCount, MetricWindow, PageCount, Project } from './digest.js';

export type QueryableMetric = 'dau' | 'wau' | 'mau' | 'pageviews' | 'top_pages';

/** Result type of {@link MetricsSource.queryMetric} per metric. */
export interface MetricValueMap {
  dau: number;
  wau: number;
  mau: number;
  pageviews: number;
  top_pages: PageCount[];
}

export interface AnalyticsIdentity {
  email: string | null;
  distinctId: string | null;
}

export interface MetricsSource {
  authenticate(): Promise<AnalyticsIdentity>;
  listProjects(): Promise<Project[]>;
  queryMetric<M extends QueryableMetric>(
    projectId: string,
    metric: M,
    window: MetricWindow
  ): Promise<MetricValueMap[M]>;
  countEvents(projectId: string, names: readonly string[], window: MetricWindow): Promise<EventCount[]>;
  topEvents(projectId: string, window: MetricWindow, limit?: number): Promise<string[]>;
}

export interface ChatTransport {
  connect(): Promise<void>;
  sendDirectMessage(userId: string, text: string): Promise<void>;
  close(): Promise<void>;
}
