/**
 * Digest Run
 *
 * One stateless run of the agent:
 *   authenticate → discover projects → collect both windows →
 *   build report → format → deliver (or print on a dry run)
 *
 * Expected failures (credentials, discovery, no reportable project,
 * delivery) come back as a DigestRunResult whose exitCode the CLI hands
 * to the process.
 */

import { AuthenticationError, DigestError, DiscoveryError, errorMessage } from '../errors.js';
import { logger } from '../logger.js';
import { discoverProjects } from '../discovery/project-discovery.js';
import { comparisonWindows } from '../orchestrator/time-range.js';
import { collectAll } from '../orchestrator/metrics-collector.js';
import { buildDigestReport } from '../insights/aggregator.js';
import { formatDigest } from '../generators/digest-formatter.js';
import { deliverDigest, type DeliveryOptions } from '../delivery/digest-delivery.js';
import type { DigestReport, Project } from '../types/digest.js';
import type { ChatTransport, MetricsSource } from '../types/sources.js';

export interface DigestRunDeps {
  source: MetricsSource;
  transport: ChatTransport;
  recipientId: string;
  /** Explicit projects; empty or absent means discover. */
  projects?: readonly Project[];
  concurrency?: number;
  /** Print the digest instead of sending it. */
  dryRun?: boolean;
  now?: () => Date;
  delivery?: DeliveryOptions;
  /** Where a dry run writes the digest. Defaults to stdout. */
  print?: (text: string) => void;
}

export type DigestRunStatus = 'delivered' | 'printed' | 'failed';

export interface DigestRunResult {
  status: DigestRunStatus;
  exitCode: 0 | 1;
  report?: DigestReport;
  text?: string;
  omittedCount: number;
  error?: Error;
}

export async function runDigest(deps: DigestRunDeps): Promise<DigestRunResult> {
  const now = deps.now ?? (() => new Date());
  const print = deps.print ?? ((text: string) => process.stdout.write(`${text}\n`));

  // ─── Authenticate & Discover ──────────────────────────────

  let projects: Project[];
  try {
    const identity = await authenticate(deps.source);
    logger.info(`Authenticated with PostHog as ${identity}`);
    projects = await discoverProjects(deps.source, deps.projects);
  } catch (error) {
    return failed(error, 0);
  }

  // ─── Collect & Build ──────────────────────────────────────

  const startedAt = now();
  const windows = comparisonWindows(startedAt);
  logger.info(
    `Comparing ${windows.current.start} → ${windows.current.end} with ${windows.baseline.start} → ${windows.baseline.end}`
  );

  const results = await collectAll(deps.source, projects, windows, {
    concurrency: deps.concurrency,
  });
  const report = buildDigestReport({
    results,
    offsetDays: windows.offsetDays,
    generatedAt: startedAt.toISOString(),
  });
  const omittedCount = report.omitted.length;

  if (omittedCount > 0) {
    logger.warn(
      `${omittedCount} project(s) omitted: ${report.omitted.map((o) => o.project.name).join(', ')}`
    );
  }

  if (report.projects.length === 0) {
    return {
      ...failed(new DigestError('No project could be reported; nothing to send', 'PROJECT_FETCH'), omittedCount),
      report,
    };
  }

  const text = formatDigest(report);

  // ─── Deliver ──────────────────────────────────────────────

  if (deps.dryRun) {
    print(text);
    logger.info(`Dry run: digest for ${report.projects.length} project(s) printed, not sent`);
    return { status: 'printed', exitCode: 0, report, text, omittedCount };
  }

  try {
    const outcome = await deliverDigest(deps.transport, deps.recipientId, text, deps.delivery);
    logger.info(
      `Digest delivered in ${outcome.chunks} message(s) for ${report.projects.length} project(s)`
    );
    return { status: 'delivered', exitCode: 0, report, text, omittedCount };
  } catch (error) {
    return { ...failed(error, omittedCount), report, text };
  }
}

/**
 * Verify the analytics key.
 * A rejected key is an AuthenticationError; an unreachable or failing
 * provider is a DiscoveryError.
 */
async function authenticate(source: MetricsSource): Promise<string> {
  try {
    const identity = await source.authenticate();
    return identity.email ?? identity.distinctId ?? 'unknown user';
  } catch (error) {
    if (error instanceof AuthenticationError) throw error;
    throw new DiscoveryError(`Could not reach PostHog: ${errorMessage(error)}`, {
      cause: error,
    });
  }
}

function failed(error: unknown, omittedCount: number): DigestRunResult {
  const err = error instanceof Error ? error : new Error(String(error));
  logger.error(err.message);
  return { status: 'failed', exitCode: 1, omittedCount, error: err };
}
