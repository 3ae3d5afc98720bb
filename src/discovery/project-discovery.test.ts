import { describe, it, expect, vi, beforeEach } from 'vitest';
import { discoverProjects, discoverEvents } from './project-discovery.js';
import { AuthenticationError, DiscoveryError } from '../errors.js';
import type { MetricsSource } from '../types/sources.js';

// Create a mock source
function createMockSource() {
  return {
    authenticate: vi.fn(),
    listProjects: vi.fn(),
    queryMetric: vi.fn(),
    countEvents: vi.fn(),
    topEvents: vi.fn(),
  };
}

const window = { start: '2026-02-06T12:00:00.000Z', end: '2026-02-07T12:00:00.000Z' };

describe('project-discovery', () => {
  let mock: ReturnType<typeof createMockSource>;
  let source: MetricsSource;

  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    mock = createMockSource();
    source = mock as unknown as MetricsSource;
  });

  describe('discoverProjects', () => {
    it('orders discovered projects by numeric id', async () => {
      mock.listProjects.mockResolvedValue([
        { id: '30', name: 'Docs' },
        { id: '4', name: 'Storefront' },
        { id: '12', name: 'Admin' },
      ]);

      const projects = await discoverProjects(source);

      expect(projects.map((p) => p.id)).toEqual(['4', '12', '30']);
    });

    it('uses configured projects without calling the API', async () => {
      const configured = [{ id: '9', name: 'Blog', customEvents: ['subscribe'] }];

      const projects = await discoverProjects(source, configured);

      expect(projects).toEqual(configured);
      expect(mock.listProjects).not.toHaveBeenCalled();
    });

    it('wraps API failures in DiscoveryError', async () => {
      mock.listProjects.mockRejectedValue(new Error('socket hang up'));

      await expect(discoverProjects(source)).rejects.toThrow(DiscoveryError);
      await expect(discoverProjects(source)).rejects.toThrow(
        'Failed to list projects: socket hang up'
      );
    });

    it('lets AuthenticationError through unchanged', async () => {
      const authError = new AuthenticationError('posthog', 'PostHog rejected the API key (401)');
      mock.listProjects.mockRejectedValue(authError);

      await expect(discoverProjects(source)).rejects.toBe(authError);
    });

    it('treats an empty project list as a discovery failure', async () => {
      mock.listProjects.mockResolvedValue([]);

      await expect(discoverProjects(source)).rejects.toThrow(
        'No projects are accessible with this API key'
      );
    });
  });

  describe('discoverEvents', () => {
    it('queries top events for the given window', async () => {
      mock.topEvents.mockResolvedValue(['signup', 'checkout']);

      const events = await discoverEvents(source, { id: '4', name: 'Storefront' }, window);

      expect(events).toEqual(['signup', 'checkout']);
      expect(mock.topEvents).toHaveBeenCalledWith('4', window, 10);
    });

    it('prefers configured events and caps them', async () => {
      const customEvents = Array.from({ length: 14 }, (_, i) => `event_${i}`);

      const events = await discoverEvents(source, { id: '4', name: 'Storefront', customEvents }, window);

      expect(events).toHaveLength(10);
      expect(events[0]).toBe('event_0');
      expect(mock.topEvents).not.toHaveBeenCalled();
    });

    it('caps a source that returns too many names', async () => {
      mock.topEvents.mockResolvedValue(Array.from({ length: 12 }, (_, i) => `e${i}`));

      const events = await discoverEvents(source, { id: '4', name: 'Storefront' }, window);

      expect(events).toHaveLength(10);
    });

    it('degrades to no events when discovery fails', async () => {
      mock.topEvents.mockRejectedValue(new Error('timeout'));

      const events = await discoverEvents(source, { id: '4', name: 'Storefront' }, window);

      expect(events).toEqual([]);
    });
  });
});
