/**
 * Digest Delivery
 *
 * Sends the formatted digest to one recipient through a ChatTransport.
 * The text is split to fit the chat provider's message cap; each step
 * (connect, every part) is retried a bounded number of times with
 * exponential backoff. A part that went out is never sent again.
 */

import { AuthenticationError, DeliveryError, errorMessage } from '../errors.js';
import { logger } from '../logger.js';
import type { ChatTransport } from '../types/sources.js';

/** Discord's hard cap is 2000 characters; leave headroom. */
export const MAX_MESSAGE_LENGTH = 1900;

export interface DeliveryOptions {
  /** Attempts per step, including the first. */
  maxAttempts?: number;
  /** Delay before the first retry; doubles on each further retry. */
  baseDelayMs?: number;
  maxMessageLength?: number;
  sleep?: (ms: number) => Promise<void>;
}

export interface DeliveryOutcome {
  /** Number of messages the digest was split into. */
  chunks: number;
  /** Total attempts across all steps. */
  attempts: number;
}

const DEFAULTS = {
  maxAttempts: 3,
  baseDelayMs: 1000,
};

export async function deliverDigest(
  transport: ChatTransport,
  recipientId: string,
  text: string,
  options: DeliveryOptions = {}
): Promise<DeliveryOutcome> {
  const maxAttempts = Math.max(1, options.maxAttempts ?? DEFAULTS.maxAttempts);
  const baseDelayMs = options.baseDelayMs ?? DEFAULTS.baseDelayMs;
  const sleep = options.sleep ?? defaultSleep;
  const chunks = splitMessage(text, options.maxMessageLength ?? MAX_MESSAGE_LENGTH);
  let attempts = 0;

  const withRetry = async (step: string, operation: () => Promise<void>): Promise<void> => {
    for (let attempt = 1; ; attempt++) {
      attempts++;
      try {
        await operation();
        return;
      } catch (error) {
        if (!isRetryable(error) || attempt >= maxAttempts) {
          throw new DeliveryError(
            `Failed to ${step} after ${attempt} attempt${attempt === 1 ? '' : 's'}: ${errorMessage(error)}`,
            attempt,
            { cause: error }
          );
        }
        const delay = baseDelayMs * 2 ** (attempt - 1);
        logger.warn(`Could not ${step} (attempt ${attempt}/${maxAttempts}), retrying in ${delay}ms`);
        await sleep(delay);
      }
    }
  };

  try {
    await withRetry('connect to Discord', () => transport.connect());
    for (const [index, chunk] of chunks.entries()) {
      await withRetry(`send part ${index + 1}/${chunks.length}`, () =>
        transport.sendDirectMessage(recipientId, chunk)
      );
      logger.info(`Sent message part ${index + 1}/${chunks.length} (${chunk.length} chars)`);
    }
  } finally {
    try {
      await transport.close();
    } catch (error) {
      logger.warn(`Failed to close the Discord connection: ${errorMessage(error)}`);
    }
  }

  return { chunks: chunks.length, attempts };
}

/**
 * Split text into messages of at most `maxLength` characters, breaking
 * between lines. A single line longer than the cap is cut into pieces.
 */
export function splitMessage(text: string, maxLength = MAX_MESSAGE_LENGTH): string[] {
  if (maxLength < 1) throw new RangeError(`maxLength must be positive, got ${maxLength}`);
  if (text.length <= maxLength) return [text];

  const chunks: string[] = [];
  let current: string | null = null;

  for (const line of text.split('\n')) {
    for (const piece of cutLine(line, maxLength)) {
      if (current === null) {
        current = piece;
      } else if (current.length + 1 + piece.length <= maxLength) {
        current = `${current}\n${piece}`;
      } else {
        chunks.push(current);
        current = piece;
      }
    }
  }
  if (current !== null && current.length > 0) chunks.push(current);

  return chunks;
}

function cutLine(line: string, maxLength: number): string[] {
  if (line.length <= maxLength) return [line];
  const pieces: string[] = [];
  for (let i = 0; i < line.length; i += maxLength) {
    pieces.push(line.slice(i, i + maxLength));
  }
  return pieces;
}

/**
 * Rejected credentials are final. Errors without a retryable flag
 * (network, timeouts) are worth another try.
 */
function isRetryable(error: unknown): boolean {
  if (error instanceof AuthenticationError) return false;
  if (typeof error === 'object' && error !== null && 'retryable' in error) {
    return error.retryable !== false;
  }
  return true;
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
