#!/usr/bin/env node

/**
 * Analytics Digest CLI
 *
 * Runs one digest: PostHog metrics for every project, compared with the
 * same window a week earlier, sent as a Discord direct message.
 * Meant to be started by a scheduler (cron, CI) once a day.
 *
 * Usage:
 *   analytics-digest [run] [--dry-run]
 *   analytics-digest help
 */

import 'dotenv/config';
import { resolveDigestConfig } from './config/digest-config.js';
import { PosthogClient } from './clients/posthog-client.js';
import { DiscordClient } from './clients/discord-client.js';
import { runDigest } from './commands/run-digest.js';
import { ConfigurationError } from './errors.js';
import { logger } from './logger.js';
import type { DigestConfig } from './config/types.js';

// ─── Argument Parsing ───────────────────────────────────────

function parseArgs(argv: string[]): { command: string; flags: Set<string> } {
  const args = argv.slice(2);
  const first = args[0];
  const command = first !== undefined && !first.startsWith('-') ? first : 'run';

  const flags = new Set<string>();
  for (const arg of command === first ? args.slice(1) : args) {
    if (arg === '-h') flags.add('help');
    else if (arg.startsWith('--')) flags.add(arg.slice(2));
  }

  return { command, flags };
}

// ─── Help ───────────────────────────────────────────────────

const HELP = `Analytics Digest - daily PostHog metrics delivered over Discord

Usage:
  analytics-digest [run] [--dry-run]   Build the digest and send it
  analytics-digest help                Show this help

Options:
  --dry-run   Print the digest to stdout instead of sending it

Environment (a .env file in the working directory is read too):
  POSTHOG_API_KEY      PostHog personal API key (required)
  POSTHOG_REGION       eu (default) or us
  DISCORD_BOT_TOKEN    Discord bot token (required)
  DISCORD_USER_ID      Discord user id of the recipient (required)
  POSTHOG_PROJECTS     JSON list of projects; skips discovery when set
                       [{"name":"Web","projectId":123,"customEvents":["signup"]}]
  DIGEST_CONCURRENCY   Maximum parallel PostHog queries (default 4)
  DIGEST_DEBUG         Set to 1 for debug logging`;

const KNOWN_FLAGS = new Set(['dry-run', 'help']);

// ─── Main ───────────────────────────────────────────────────

async function main(): Promise<number> {
  const { command, flags } = parseArgs(process.argv);

  if (command === 'help' || flags.has('help')) {
    console.log(HELP);
    return 0;
  }
  if (command !== 'run') {
    console.error(`Unknown command: ${command}\n\n${HELP}`);
    return 1;
  }
  const unknown = [...flags].filter((flag) => !KNOWN_FLAGS.has(flag));
  if (unknown.length > 0) {
    console.error(`Unknown option: --${unknown.join(', --')}\n\n${HELP}`);
    return 1;
  }

  let config: DigestConfig;
  try {
    config = resolveDigestConfig();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      logger.error(error.message);
      return 1;
    }
    throw error;
  }

  const result = await runDigest({
    source: new PosthogClient(config.posthog.apiKey, config.posthog.region),
    transport: new DiscordClient(config.discord.botToken),
    recipientId: config.discord.recipientId,
    projects: config.projects,
    concurrency: config.concurrency,
    dryRun: flags.has('dry-run'),
  });

  return result.exitCode;
}

main().then(
  (code) => process.exit(code),
  (error: unknown) => {
    console.error('Fatal error:', error);
    process.exit(1);
  }
);
