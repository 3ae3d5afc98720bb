/**
 * Configuration Types
 *
 * The resolved runtime configuration of a digest run. The Zod schema in
 * digest-config.ts validates the environment into this shape.
 */

import type { PosthogRegion } from '../clients/posthog-client.js';
import type { Project } from '../types/digest.js';

/** PostHog credentials and endpoint region. */
export interface PosthogSettings {
  apiKey: string;
  region: PosthogRegion;
}

/** Discord bot credentials and the one recipient of the digest. */
export interface DiscordSettings {
  botToken: string;
  recipientId: string;
}

export interface DigestConfig {
  posthog: PosthogSettings;
  discord: DiscordSettings;
  /** Explicit projects; empty means discover every accessible project. */
  projects: Project[];
  /** Maximum in-flight analytics requests. */
  concurrency: number;
}
