import { describe, it, expect } from 'vitest';
import { aggregate, buildDigestReport } from './aggregator.js';
import { compareSnapshots } from './trend-calculator.js';
import { ProjectFetchError } from '../errors.js';
import type { ProjectFetchResult } from '../orchestrator/metrics-collector.js';
import type { MetricSnapshot, Project, ProjectDigest } from '../types/digest.js';

function makeSnapshot(overrides: Partial<MetricSnapshot> = {}): MetricSnapshot {
  return {
    projectId: '1',
    window: { start: '2026-02-06T12:00:00.000Z', end: '2026-02-07T12:00:00.000Z' },
    dau: 0,
    wau: 0,
    mau: 0,
    pageviews: 0,
    topPages: [],
    customEvents: [],
    ...overrides,
  };
}

function makeDigest(
  project: Project,
  current: Partial<MetricSnapshot>,
  baseline: Partial<MetricSnapshot>
): ProjectDigest {
  const snapshot = makeSnapshot({ projectId: project.id, ...current });
  const { comparisons, events } = compareSnapshots(
    snapshot,
    makeSnapshot({ projectId: project.id, ...baseline })
  );
  return { project, snapshot, comparisons, events };
}

function success(
  project: Project,
  current: Partial<MetricSnapshot>,
  baseline: Partial<MetricSnapshot>
): ProjectFetchResult {
  return {
    ok: true,
    project,
    snapshots: {
      current: makeSnapshot({ projectId: project.id, ...current }),
      baseline: makeSnapshot({ projectId: project.id, ...baseline }),
    },
  };
}

const projectA: Project = { id: '1', name: 'Project A' };
const projectB: Project = { id: '2', name: 'Project B' };

describe('aggregator', () => {
  describe('aggregate', () => {
    it('sums raw values instead of averaging percentages', () => {
      const summary = aggregate([
        makeDigest(projectA, { dau: 25 }, { dau: 20 }),
        makeDigest(projectB, { dau: 20 }, { dau: 25 }),
      ]);

      // A is +25%, B is -20%; the totals did not move
      expect(summary.dau).toEqual({
        metric: 'dau',
        current: 45,
        previous: 45,
        deltaPct: 0,
        direction: 'flat',
      });
    });

    it('does not depend on project order', () => {
      const digests = [
        makeDigest(projectA, { dau: 3, pageviews: 40 }, { dau: 1, pageviews: 10 }),
        makeDigest(projectB, { dau: 8, pageviews: 5 }, { dau: 9, pageviews: 50 }),
      ];

      const forward = aggregate(digests);
      const reversed = aggregate([...digests].reverse());

      expect(forward).toEqual(reversed);
      expect(forward.dau.current).toBe(11);
      expect(forward.pageviews.previous).toBe(60);
    });

    it('summarizes only additive metrics', () => {
      const summary = aggregate([makeDigest(projectA, { mau: 10 }, { mau: 5 })]);

      expect(Object.keys(summary)).toEqual(['dau', 'pageviews']);
    });

    it('returns a flat zero summary for no projects', () => {
      const summary = aggregate([]);

      expect(summary.dau).toMatchObject({ current: 0, previous: 0, direction: 'flat' });
    });
  });

  describe('buildDigestReport', () => {
    it('keeps successful projects in slot order and lists failures as omitted', () => {
      const report = buildDigestReport({
        results: [
          {
            ok: false,
            project: projectA,
            error: new ProjectFetchError(projectA, 'PostHog API error: 500 Internal Server Error'),
          },
          success(projectB, { dau: 20 }, { dau: 25 }),
        ],
        offsetDays: 7,
        generatedAt: '2026-02-07T12:00:00.000Z',
      });

      expect(report.projects.map((p) => p.project.name)).toEqual(['Project B']);
      expect(report.omitted).toEqual([
        { project: projectA, reason: 'PostHog API error: 500 Internal Server Error' },
      ]);
      expect(report.summary.dau).toMatchObject({ current: 20, previous: 25, deltaPct: -20 });
      expect(report.projects[0]?.comparisons.dau.direction).toBe('down');
    });

    it('attaches the current snapshot to each project digest', () => {
      const report = buildDigestReport({
        results: [success(projectA, { dau: 4, wau: 9 }, { dau: 2 })],
        offsetDays: 7,
        generatedAt: '2026-02-07T12:00:00.000Z',
      });

      expect(report.projects[0]?.snapshot.wau).toBe(9);
      expect(report.generatedAt).toBe('2026-02-07T12:00:00.000Z');
      expect(report.offsetDays).toBe(7);
    });
  });
});
