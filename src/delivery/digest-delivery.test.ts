import { describe, it, expect, vi, beforeEach } from 'vitest';
import { deliverDigest, splitMessage } from './digest-delivery.js';
import { DiscordClientError } from '../clients/discord-client.js';
import { AuthenticationError, DeliveryError } from '../errors.js';

function createTransport() {
  return {
    connect: vi.fn(async (): Promise<void> => undefined),
    sendDirectMessage: vi.fn(async (_userId: string, _text: string): Promise<void> => undefined),
    close: vi.fn(async (): Promise<void> => undefined),
  };
}

const THREE_LINES = ['a'.repeat(10), 'b'.repeat(10), 'c'.repeat(10)].join('\n');

async function captureDeliveryError(promise: Promise<unknown>): Promise<DeliveryError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof DeliveryError) return error;
    throw error;
  }
  throw new Error('expected a DeliveryError');
}

describe('digest-delivery', () => {
  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  describe('splitMessage', () => {
    it('keeps short text as one message', () => {
      expect(splitMessage('hello\nworld', 100)).toEqual(['hello\nworld']);
    });

    it('breaks between lines', () => {
      expect(splitMessage(THREE_LINES, 25)).toEqual([
        'aaaaaaaaaa\nbbbbbbbbbb',
        'cccccccccc',
      ]);
    });

    it('cuts a line longer than the cap', () => {
      expect(splitMessage(`${'x'.repeat(12)}\nyy`, 5)).toEqual(['xxxxx', 'xxxxx', 'xx\nyy']);
    });

    it('never produces a message over the cap', () => {
      const text = Array.from({ length: 200 }, (_, i) => `line ${i} ${'-'.repeat(i % 37)}`).join('\n');

      const chunks = splitMessage(text, 120);

      expect(chunks.length).toBeGreaterThan(1);
      for (const chunk of chunks) {
        expect(chunk.length).toBeLessThanOrEqual(120);
      }
      expect(chunks.join('\n')).toBe(text);
    });

    it('rejects a non-positive cap', () => {
      expect(() => splitMessage('x', 0)).toThrow(RangeError);
    });
  });

  describe('deliverDigest', () => {
    it('connects, sends every part in order and closes', async () => {
      const transport = createTransport();

      const outcome = await deliverDigest(transport, '42', THREE_LINES, { maxMessageLength: 25 });

      expect(outcome).toEqual({ chunks: 2, attempts: 3 });
      expect(transport.sendDirectMessage.mock.calls).toEqual([
        ['42', 'aaaaaaaaaa\nbbbbbbbbbb'],
        ['42', 'cccccccccc'],
      ]);
      expect(transport.close).toHaveBeenCalledOnce();
    });

    it('fails with DeliveryError after exhausting retries, without duplicate sends', async () => {
      const transport = createTransport();
      transport.sendDirectMessage.mockRejectedValue(new Error('gateway timeout'));
      const sleep = vi.fn(async (_ms: number): Promise<void> => undefined);

      const error = await captureDeliveryError(
        deliverDigest(transport, '42', 'digest', { maxAttempts: 3, baseDelayMs: 1000, sleep })
      );

      expect(error.message).toBe('Failed to send part 1/1 after 3 attempts: gateway timeout');
      expect(error.attempts).toBe(3);
      expect(transport.sendDirectMessage).toHaveBeenCalledTimes(3);
      expect(sleep.mock.calls).toEqual([[1000], [2000]]);
      expect(transport.close).toHaveBeenCalledOnce();
    });

    it('retries only the part that failed', async () => {
      const transport = createTransport();
      transport.sendDirectMessage
        .mockResolvedValueOnce(undefined)
        .mockRejectedValueOnce(new Error('connection reset'))
        .mockResolvedValueOnce(undefined);
      const sleep = vi.fn(async (_ms: number): Promise<void> => undefined);

      const outcome = await deliverDigest(transport, '42', THREE_LINES, {
        maxMessageLength: 25,
        sleep,
      });

      expect(outcome).toEqual({ chunks: 2, attempts: 4 });
      expect(transport.sendDirectMessage.mock.calls.map(([, text]) => text)).toEqual([
        'aaaaaaaaaa\nbbbbbbbbbb',
        'cccccccccc',
        'cccccccccc',
      ]);
      expect(sleep).toHaveBeenCalledOnce();
    });

    it('stops at once on a non-retryable failure', async () => {
      const transport = createTransport();
      transport.sendDirectMessage.mockRejectedValue(
        new DiscordClientError('Failed to message user 42: Unknown User', false)
      );
      const sleep = vi.fn(async (_ms: number): Promise<void> => undefined);

      const error = await captureDeliveryError(deliverDigest(transport, '42', 'digest', { sleep }));

      expect(error.message).toBe(
        'Failed to send part 1/1 after 1 attempt: Failed to message user 42: Unknown User'
      );
      expect(error.attempts).toBe(1);
      expect(sleep).not.toHaveBeenCalled();
      expect(transport.close).toHaveBeenCalledOnce();
    });

    it('does not retry a rejected bot token', async () => {
      const transport = createTransport();
      const rejected = new AuthenticationError('discord', 'Discord rejected the bot token: invalid');
      transport.connect.mockRejectedValue(rejected);
      const sleep = vi.fn(async (_ms: number): Promise<void> => undefined);

      const error = await captureDeliveryError(deliverDigest(transport, '42', 'digest', { sleep }));

      expect(error.attempts).toBe(1);
      expect(error.cause).toBe(rejected);
      expect(transport.connect).toHaveBeenCalledOnce();
      expect(sleep).not.toHaveBeenCalled();
    });

    it('sends nothing when the connection cannot be made', async () => {
      const transport = createTransport();
      transport.connect.mockRejectedValue(new Error('socket hang up'));

      const error = await captureDeliveryError(
        deliverDigest(transport, '42', 'digest', { maxAttempts: 2, sleep: async () => undefined })
      );

      expect(error.message).toBe('Failed to connect to Discord after 2 attempts: socket hang up');
      expect(transport.sendDirectMessage).not.toHaveBeenCalled();
      expect(transport.close).toHaveBeenCalledOnce();
    });

    it('does not fail a delivered digest when closing fails', async () => {
      const transport = createTransport();
      transport.close.mockRejectedValue(new Error('already destroyed'));

      await expect(deliverDigest(transport, '42', 'digest')).resolves.toEqual({
        chunks: 1,
        attempts: 2,
      });
    });
  });
});
