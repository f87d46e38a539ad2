import pino from 'pino';
import type { Logger } from 'pino';

export type { Logger };

/** Credentials that must never reach the log stream */
const REDACTED_PATHS = ['token', 'accessToken', 'refreshToken', 'secret', 'headers.authorization'];

export function createLogger(name: string): Logger {
  return pino({
    name,
    level: process.env.LOG_LEVEL || 'info',
    redact: { paths: REDACTED_PATHS, censor: '****' },
    transport:
      process.env.NODE_ENV === 'development'
        ? { target: 'pino-pretty', options: { colorize: true, translateTime: 'HH:MM:ss' } }
        : undefined,
  });
}
