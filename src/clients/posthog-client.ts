/**
 * PostHog REST API Client
 *
 * Uses native fetch (Node 18+). All metric reads go through HogQL queries
 * with bound placeholders; responses are validated and mapped to our
 * internal types. One instance is one authenticated session.
 *
 * Rate limits (429), server errors and network failures are retried a
 * bounded number of times with exponential backoff.
 */

import type { z } from 'zod';
import {
  HogQLResponseSchema,
  PosthogProjectListSchema,
  PosthogUserSchema,
  type HogQLQuery,
} from './types.js';
import { AuthenticationError, errorMessage } from '../errors.js';
import { logger } from '../logger.js';
import { lookbackWindow } from '../orchestrator/time-range.js';
import type { EventCount, MetricWindow, PageCount, Project } from '../types/digest.js';
import type {
  AnalyticsIdentity,
  MetricsSource,
  MetricValueMap,
  QueryableMetric,
} from '../types/sources.js';

export type PosthogRegion = 'eu' | 'us';

const DEFAULT_TIMEOUT_MS = 30_000;
const DEFAULT_MAX_ATTEMPTS = 3;
const DEFAULT_BASE_DELAY_MS = 1000;
const TOP_PAGES_LIMIT = 5;
const TOP_EVENTS_LIMIT = 10;
/** Guard against a `next` link that never ends. */
const MAX_PROJECT_PAGES = 50;

export function posthogBaseUrl(region: PosthogRegion): string {
  return `https://${region}.posthog.com`;
}

export class PosthogClientError extends Error {
  constructor(
    message: string,
    public statusCode: number,
    public retryable: boolean
  ) {
    super(message);
    this.name = 'PosthogClientError';
  }
}

export interface PosthogClientOptions {
  timeoutMs?: number;
  /** Attempts per request, including the first. */
  maxAttempts?: number;
  /** Delay before the first retry; doubles on each further retry. */
  baseDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

type MetricQueryTable = {
  [M in QueryableMetric]: (projectId: string, window: MetricWindow) => Promise<MetricValueMap[M]>;
};

export class PosthogClient implements MetricsSource {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly maxAttempts: number;
  private readonly baseDelayMs: number;
  private readonly sleep: (ms: number) => Promise<void>;

  private readonly metricQueries: MetricQueryTable = {
    dau: (projectId, window) => this.countActiveUsers(projectId, window),
    wau: (projectId, window) => this.countActiveUsers(projectId, lookbackWindow(window, 7)),
    mau: (projectId, window) => this.countActiveUsers(projectId, lookbackWindow(window, 30)),
    pageviews: (projectId, window) => this.countPageviews(projectId, window),
    top_pages: (projectId, window) => this.getTopPages(projectId, window),
  };

  constructor(
    private readonly apiKey: string,
    region: PosthogRegion,
    options: PosthogClientOptions = {}
  ) {
    this.baseUrl = posthogBaseUrl(region);
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.maxAttempts = Math.max(1, options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS);
    this.baseDelayMs = options.baseDelayMs ?? DEFAULT_BASE_DELAY_MS;
    this.sleep = options.sleep ?? defaultSleep;
  }

  // ─── Authentication ─────────────────────────────────────

  /**
   * Validate the API key against the current user endpoint.
   * 401/403 become AuthenticationError; anything else propagates.
   */
  async authenticate(): Promise<AnalyticsIdentity> {
    try {
      const user = await this.get('/api/users/@me/', PosthogUserSchema);
      return { email: user.email ?? null, distinctId: user.distinct_id ?? null };
    } catch (error) {
      throw asAuthenticationError(error);
    }
  }

  // ─── Discovery ──────────────────────────────────────────

  /**
   * List every project the key can read, following pagination.
   * Entries without an id are skipped.
   */
  async listProjects(): Promise<Project[]> {
    const projects: Project[] = [];
    let path: string | null = '/api/projects/';

    try {
      for (let page = 0; path && page < MAX_PROJECT_PAGES; page++) {
        const data: z.infer<typeof PosthogProjectListSchema> = await this.get(
          path,
          PosthogProjectListSchema
        );
        for (const raw of data.results) {
          if (raw.id === null || raw.id === undefined || raw.id === '') continue;
          const id = String(raw.id);
          projects.push({ id, name: raw.name?.trim() || `Project ${id}` });
        }
        path = data.next ? this.relativePath(data.next) : null;
      }
    } catch (error) {
      throw asAuthenticationError(error);
    }

    if (path) {
      logger.warn(
        `Stopped listing projects after ${MAX_PROJECT_PAGES} pages; the project list may be incomplete`
      );
    }

    return projects;
  }

  /**
   * Top custom events in a window, by volume.
   * PostHog's own events ($pageview, ...) and internal ones (!...) are excluded.
   */
  async topEvents(
    projectId: string,
    window: MetricWindow,
    limit = TOP_EVENTS_LIMIT
  ): Promise<string[]> {
    const rows = await this.hogql(projectId, {
      kind: 'HogQLQuery',
      query: `
        SELECT event, count() AS total
        FROM events
        WHERE timestamp >= toDateTime({from}) AND timestamp < toDateTime({to})
          AND NOT startsWith(event, '$')
          AND NOT startsWith(event, '!')
        GROUP BY event
        ORDER BY total DESC, event ASC
        LIMIT ${toLimit(limit)}
      `,
      values: { from: window.start, to: window.end },
    });

    return rows.flatMap(([event]) => (typeof event === 'string' && event.length > 0 ? [event] : []));
  }

  // ─── Metrics ────────────────────────────────────────────

  queryMetric<M extends QueryableMetric>(
    projectId: string,
    metric: M,
    window: MetricWindow
  ): Promise<MetricValueMap[M]> {
    const run = this.metricQueries[metric];
    return run(projectId, window);
  }

  /**
   * Count occurrences of each named event in one query.
   * Names with no rows are returned with count 0, in input order.
   */
  async countEvents(
    projectId: string,
    names: readonly string[],
    window: MetricWindow
  ): Promise<EventCount[]> {
    if (names.length === 0) return [];

    const rows = await this.hogql(projectId, {
      kind: 'HogQLQuery',
      query: `
        SELECT event, count() AS total
        FROM events
        WHERE event IN {names}
          AND timestamp >= toDateTime({from}) AND timestamp < toDateTime({to})
        GROUP BY event
      `,
      values: { names: [...names], from: window.start, to: window.end },
    });

    const counts = new Map<string, number>();
    for (const [event, total] of rows) {
      if (typeof event === 'string') counts.set(event, toCount(total));
    }
    return names.map((name) => ({ name, count: counts.get(name) ?? 0 }));
  }

  private async countActiveUsers(projectId: string, window: MetricWindow): Promise<number> {
    const rows = await this.hogql(projectId, {
      kind: 'HogQLQuery',
      query: `
        SELECT count(DISTINCT person_id)
        FROM events
        WHERE event = '$pageview'
          AND timestamp >= toDateTime({from}) AND timestamp < toDateTime({to})
      `,
      values: { from: window.start, to: window.end },
    });
    return toCount(rows[0]?.[0]);
  }

  private async countPageviews(projectId: string, window: MetricWindow): Promise<number> {
    const rows = await this.hogql(projectId, {
      kind: 'HogQLQuery',
      query: `
        SELECT count()
        FROM events
        WHERE event = '$pageview'
          AND timestamp >= toDateTime({from}) AND timestamp < toDateTime({to})
      `,
      values: { from: window.start, to: window.end },
    });
    return toCount(rows[0]?.[0]);
  }

  private async getTopPages(projectId: string, window: MetricWindow): Promise<PageCount[]> {
    const rows = await this.hogql(projectId, {
      kind: 'HogQLQuery',
      query: `
        SELECT properties.$current_url AS page, count() AS views
        FROM events
        WHERE event = '$pageview'
          AND timestamp >= toDateTime({from}) AND timestamp < toDateTime({to})
          AND page IS NOT NULL
        GROUP BY page
        ORDER BY views DESC, page ASC
        LIMIT ${TOP_PAGES_LIMIT}
      `,
      values: { from: window.start, to: window.end },
    });

    return rows.flatMap(([page, views]) =>
      typeof page === 'string' && page.length > 0 ? [{ path: page, count: toCount(views) }] : []
    );
  }

  // ─── HTTP Layer ──────────────────────────────────────────

  private async hogql(projectId: string, query: HogQLQuery): Promise<unknown[][]> {
    const data = await this.request(
      `/api/projects/${encodeURIComponent(projectId)}/query/`,
      HogQLResponseSchema,
      { method: 'POST', body: JSON.stringify({ query }) }
    );
    return data.results;
  }

  private get<S extends z.ZodTypeAny>(path: string, schema: S): Promise<z.infer<S>> {
    return this.request(path, schema, { method: 'GET' });
  }

  private async request<S extends z.ZodTypeAny>(
    path: string,
    schema: S,
    init: { method: 'GET' | 'POST'; body?: string }
  ): Promise<z.infer<S>> {
    for (let attempt = 1; ; attempt++) {
      try {
        return await this.send(path, schema, init);
      } catch (error) {
        if (!isTransient(error) || attempt >= this.maxAttempts) throw error;
        const delay = this.baseDelayMs * 2 ** (attempt - 1);
        logger.warn(
          `PostHog request ${path} failed (attempt ${attempt}/${this.maxAttempts}): ${errorMessage(error)}; retrying in ${delay}ms`
        );
        await this.sleep(delay);
      }
    }
  }

  private async send<S extends z.ZodTypeAny>(
    path: string,
    schema: S,
    init: { method: 'GET' | 'POST'; body?: string }
  ): Promise<z.infer<S>> {
    const url = `${this.baseUrl}${path}`;
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await fetch(url, {
        method: init.method,
        body: init.body,
        headers: {
          Authorization: `Bearer ${this.apiKey}`,
          'Content-Type': 'application/json',
        },
        signal: controller.signal,
      });

      if (!response.ok) {
        const retryable = response.status === 429 || response.status >= 500;
        throw new PosthogClientError(
          `PostHog API error: ${response.status} ${response.statusText} for ${path}`,
          response.status,
          retryable
        );
      }

      const parsed = schema.safeParse(await response.json());
      if (!parsed.success) {
        throw new PosthogClientError(
          `Unexpected PostHog response for ${path}: ${parsed.error.issues[0]?.message ?? 'invalid body'}`,
          response.status,
          false
        );
      }
      return parsed.data;
    } finally {
      clearTimeout(timeout);
    }
  }

  /** `next` links are absolute; keep requests on our own base URL. */
  private relativePath(next: string): string {
    const url = new URL(next, this.baseUrl);
    return `${url.pathname}${url.search}`;
  }
}

// ─── Helpers ─────────────────────────────────────────────────

function asAuthenticationError(error: unknown): unknown {
  if (
    error instanceof PosthogClientError &&
    (error.statusCode === 401 || error.statusCode === 403)
  ) {
    return new AuthenticationError('posthog', `PostHog rejected the API key (${error.statusCode})`, {
      cause: error,
    });
  }
  return error;
}

/** Retryable API errors, plus anything fetch itself threw (network, timeout). */
function isTransient(error: unknown): boolean {
  return error instanceof PosthogClientError ? error.retryable : true;
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** HogQL returns counts as numbers, occasionally as numeric strings. */
function toCount(value: unknown): number {
  const n = typeof value === 'number' ? value : typeof value === 'string' ? Number(value) : NaN;
  return Number.isFinite(n) && n > 0 ? Math.floor(n) : 0;
}

function toLimit(limit: number): number {
  return Math.max(1, Math.floor(limit));
}
