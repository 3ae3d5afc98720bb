/**
 * Discord Bot Client
 *
 * Sends direct messages through discord.js. One connect() per run;
 * errors are mapped to DiscordClientError with a retryable flag so the
 * delivery layer can decide whether another attempt makes sense.
 */

import {
  Client,
  DiscordAPIError,
  DiscordjsError,
  DiscordjsErrorCodes,
  GatewayIntentBits,
} from 'discord.js';
import { AuthenticationError, errorMessage } from '../errors.js';
import type { ChatTransport } from '../types/sources.js';

export class DiscordClientError extends Error {
  constructor(
    message: string,
    public retryable: boolean,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'DiscordClientError';
  }
}

/** Login failures caused by the bot token itself. */
const TOKEN_ERROR_CODES = new Set<string>([
  DiscordjsErrorCodes.TokenInvalid,
  DiscordjsErrorCodes.TokenMissing,
]);

/** Login failures that another attempt cannot fix. */
const FATAL_LOGIN_CODES = new Set<string>([
  ...TOKEN_ERROR_CODES,
  DiscordjsErrorCodes.DisallowedIntents,
]);

export class DiscordClient implements ChatTransport {
  private client: Client | null = null;

  constructor(private readonly botToken: string) {}

  async connect(): Promise<void> {
    if (this.client) return;

    const client = new Client({ intents: [GatewayIntentBits.DirectMessages] });
    try {
      await client.login(this.botToken);
    } catch (error) {
      await client.destroy();
      if (error instanceof DiscordjsError && TOKEN_ERROR_CODES.has(error.code)) {
        throw new AuthenticationError(
          'discord',
          `Discord rejected the bot token: ${errorMessage(error)}`,
          { cause: error }
        );
      }
      throw toClientError(error, 'Discord login failed');
    }
    this.client = client;
  }

  /**
   * Fetch the user, open (or reuse) the DM channel and send one message.
   */
  async sendDirectMessage(userId: string, text: string): Promise<void> {
    if (!this.client) {
      throw new DiscordClientError('Discord client is not connected', false);
    }

    try {
      const user = await this.client.users.fetch(userId);
      const channel = await user.createDM();
      await channel.send(text);
    } catch (error) {
      throw toClientError(error, `Failed to message user ${userId}`);
    }
  }

  async close(): Promise<void> {
    const client = this.client;
    this.client = null;
    if (client) {
      await client.destroy();
    }
  }
}

/**
 * Map a discord.js failure to DiscordClientError.
 * 4xx API errors (unknown user, DMs closed, missing access) and bad
 * credentials are final; 429, 5xx and network errors are retryable.
 */
export function toClientError(error: unknown, context: string): DiscordClientError {
  if (error instanceof DiscordClientError) return error;

  const message = `${context}: ${error instanceof Error ? error.message : String(error)}`;

  if (error instanceof DiscordAPIError) {
    const retryable = error.status === 429 || error.status >= 500;
    return new DiscordClientError(message, retryable, { cause: error });
  }
  if (error instanceof DiscordjsError && FATAL_LOGIN_CODES.has(error.code)) {
    return new DiscordClientError(message, false, { cause: error });
  }
  return new DiscordClientError(message, true, { cause: error });
}
