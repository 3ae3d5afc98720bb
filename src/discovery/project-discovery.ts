/**
 * Project & Event Discovery
 *
 * Resolves which projects a run reports on and, per project, which
 * custom events to track. Project discovery failing is fatal to the run;
 * event discovery failing only costs that project its event section.
 */

import { AuthenticationError, DiscoveryError, errorMessage } from '../errors.js';
import { logger } from '../logger.js';
import type { MetricWindow, Project } from '../types/digest.js';
import type { MetricsSource } from '../types/sources.js';

export const MAX_CUSTOM_EVENTS = 10;

/**
 * Resolve the projects to report on.
 *
 * A non-empty configured list is used as is. Otherwise every project the
 * key can read is listed and ordered by id, numerically where possible.
 */
export async function discoverProjects(
  source: MetricsSource,
  configured: readonly Project[] = []
): Promise<Project[]> {
  if (configured.length > 0) {
    logger.info(`Using ${configured.length} configured project(s)`);
    return [...configured];
  }

  let projects: Project[];
  try {
    projects = await source.listProjects();
  } catch (error) {
    if (error instanceof AuthenticationError) throw error;
    throw new DiscoveryError(`Failed to list projects: ${errorMessage(error)}`, { cause: error });
  }

  if (projects.length === 0) {
    throw new DiscoveryError('No projects are accessible with this API key');
  }

  const sorted = [...projects].sort(compareProjectIds);
  for (const project of sorted) {
    logger.info(`Discovered project: ${project.name} (ID: ${project.id})`);
  }
  return sorted;
}

/**
 * Resolve the custom events tracked for one project.
 *
 * Configured events win. Otherwise the top events of the *current* window
 * are used; the caller queries that same set for the baseline, so an event
 * that is new this period still gets a baseline of zero.
 */
export async function discoverEvents(
  source: MetricsSource,
  project: Project,
  window: MetricWindow,
  limit = MAX_CUSTOM_EVENTS
): Promise<string[]> {
  if (project.customEvents && project.customEvents.length > 0) {
    return dedupe(project.customEvents).slice(0, limit);
  }

  try {
    const events = await source.topEvents(project.id, window, limit);
    logger.debug(`Discovered ${events.length} custom events for ${project.name}`);
    return dedupe(events).slice(0, limit);
  } catch (error) {
    logger.warn(`Failed to discover custom events for ${project.name}: ${errorMessage(error)}`);
    return [];
  }
}

function compareProjectIds(a: Project, b: Project): number {
  const na = Number(a.id);
  const nb = Number(b.id);
  if (Number.isFinite(na) && Number.isFinite(nb) && na !== nb) {
    return na - nb;
  }
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

function dedupe(names: readonly string[]): string[] {
  return Array.from(new Set(names));
}
