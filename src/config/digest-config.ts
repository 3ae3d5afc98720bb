/**
 * Digest Configuration Resolver
 *
 * Reads the run configuration from environment variables:
 *   POSTHOG_API_KEY, POSTHOG_REGION, DISCORD_BOT_TOKEN, DISCORD_USER_ID,
 *   POSTHOG_PROJECTS (optional JSON list), DIGEST_CONCURRENCY (optional)
 *
 * Validated with Zod. Every problem is collected into one
 * ConfigurationError so a misconfigured job reports all of them at once.
 */

import { z } from 'zod';
import { ConfigurationError } from '../errors.js';
import { DEFAULT_CONCURRENCY } from '../orchestrator/limiter.js';
import type { Project } from '../types/digest.js';
import type { DigestConfig } from './types.js';

// ─── Zod Schemas ─────────────────────────────────────────────

const ProjectEntrySchema = z.object({
  name: z.string().min(1),
  projectId: z.union([z.string().min(1), z.number().int().nonnegative()]).transform(String),
  customEvents: z.array(z.string().min(1)).default([]),
  color: z.number().int().min(0).max(0xffffff).optional(),
});

const ProjectListSchema = z.array(ProjectEntrySchema);

const EnvSchema = z.object({
  POSTHOG_API_KEY: z.string({ required_error: 'is required' }),
  POSTHOG_REGION: z
    .string()
    .transform((value) => value.toLowerCase())
    .pipe(z.enum(['eu', 'us']))
    .default('eu'),
  DISCORD_BOT_TOKEN: z.string({ required_error: 'is required' }),
  DISCORD_USER_ID: z
    .string({ required_error: 'is required' })
    .regex(/^\d+$/, 'must be a numeric Discord user id'),
  POSTHOG_PROJECTS: z.string().optional(),
  DIGEST_CONCURRENCY: z.coerce.number().int().positive().default(DEFAULT_CONCURRENCY),
});

// ─── Resolve ─────────────────────────────────────────────────

/**
 * Resolve the digest configuration from an environment map.
 * Blank values count as missing.
 * Throws ConfigurationError listing every invalid variable.
 */
export function resolveDigestConfig(env: NodeJS.ProcessEnv = process.env): DigestConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== '')
  );

  const result = EnvSchema.safeParse(present);
  if (!result.success) {
    throw new ConfigurationError(
      result.error.issues.map((issue) => `${issue.path.join('.')} ${issue.message}`)
    );
  }

  const vars = result.data;
  const projects = vars.POSTHOG_PROJECTS ? parseProjects(vars.POSTHOG_PROJECTS) : [];

  return {
    posthog: { apiKey: vars.POSTHOG_API_KEY.trim(), region: vars.POSTHOG_REGION },
    discord: { botToken: vars.DISCORD_BOT_TOKEN.trim(), recipientId: vars.DISCORD_USER_ID },
    projects,
    concurrency: vars.DIGEST_CONCURRENCY,
  };
}

/**
 * Parse POSTHOG_PROJECTS, e.g.
 *   [{"name":"Storefront","projectId":101,"customEvents":["signup"],"color":3447003}]
 */
export function parseProjects(raw: string): Project[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ConfigurationError([
      `POSTHOG_PROJECTS is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
    ]);
  }

  const result = ProjectListSchema.safeParse(parsed);
  if (!result.success) {
    throw new ConfigurationError(
      result.error.issues.map((issue) => `POSTHOG_PROJECTS[${issue.path.join('.')}] ${issue.message}`)
    );
  }

  return result.data.map((entry) => ({
    id: entry.projectId,
    name: entry.name,
    ...(entry.customEvents.length > 0 ? { customEvents: entry.customEvents } : {}),
    ...(entry.color !== undefined ? { color: entry.color } : {}),
  }));
}
