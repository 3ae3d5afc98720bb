/**
 * Error Taxonomy
 *
 * Fatal errors (configuration, authentication, discovery) stop a run before
 * any side effect. ProjectFetchError is recovered inside the collector.
 * DeliveryError ends a run that computed a digest but could not send it.
 */

import type { Project } from './types/digest.js';

export type DigestErrorCode =
  | 'CONFIGURATION'
  | 'AUTHENTICATION'
  | 'DISCOVERY'
  | 'PROJECT_FETCH'
  | 'DELIVERY';

export class DigestError extends Error {
  constructor(
    message: string,
    public readonly code: DigestErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'DigestError';
  }
}

export class ConfigurationError extends DigestError {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration:\n  - ${issues.join('\n  - ')}`, 'CONFIGURATION');
    this.name = 'ConfigurationError';
  }
}

export class AuthenticationError extends DigestError {
  constructor(
    public readonly service: 'posthog' | 'discord',
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, 'AUTHENTICATION', options);
    this.name = 'AuthenticationError';
  }
}

export class DiscoveryError extends DigestError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'DISCOVERY', options);
    this.name = 'DiscoveryError';
  }
}

export class ProjectFetchError extends DigestError {
  constructor(
    public readonly project: Project,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, 'PROJECT_FETCH', options);
    this.name = 'ProjectFetchError';
  }
}

export class DeliveryError extends DigestError {
  constructor(
    message: string,
    public readonly attempts: number,
    options?: { cause?: unknown }
  ) {
    super(message, 'DELIVERY', options);
    this.name = 'DeliveryError';
  }
}

/** Message of any thrown value. */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
