/**
 * Logger
 *
 * Everything goes to stderr so stdout carries only the digest text
 * (dry runs pipe it elsewhere).
 */

const PREFIX = '[analytics-digest]';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

function debugEnabled(): boolean {
  const flag = process.env['DIGEST_DEBUG'];
  return flag === '1' || flag === 'true';
}

function write(level: LogLevel, message: string, extra: unknown[]): void {
  if (level === 'debug' && !debugEnabled()) return;
  console.error(`${PREFIX} ${level.toUpperCase()} ${message}`, ...extra);
}

export const logger = {
  debug: (message: string, ...extra: unknown[]): void => write('debug', message, extra),
  info: (message: string, ...extra: unknown[]): void => write('info', message, extra),
  warn: (message: string, ...extra: unknown[]): void => write('warn', message, extra),
  error: (message: string, ...extra: unknown[]): void => write('error', message, extra),
};
