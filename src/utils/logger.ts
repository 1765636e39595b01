/**
 * Logging with Pino - broker tokens are redacted
 */

import pino from 'pino';

const redactPaths = [
  'token',
  'apiToken',
  'tradierToken',
  'authorization',
  'Authorization',
  'secret',
  '*.token',
  '*.apiToken',
  'headers.authorization',
  'headers.Authorization',
];

const isTest = process.env.NODE_ENV === 'test';

export const logger = pino({
  level: process.env.LOG_LEVEL || (isTest ? 'silent' : 'info'),
  redact: {
    paths: redactPaths,
    censor: '[REDACTED]',
  },
  transport:
    process.env.NODE_ENV !== 'production' && !isTest
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            ignore: 'pid,hostname',
          },
        }
      : undefined,
});

export type Logger = pino.Logger;

export function createChildLogger(name: string): Logger {
  return logger.child({ module: name });
}
