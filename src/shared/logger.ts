import pino from 'pino';
import type { Logger } from 'pino';

const env = process.env['NODE_ENV'];

export const logger = pino({
  level: process.env['LOG_LEVEL'] ?? 'info',
  transport:
    env !== 'production' && env !== 'test'
      ? { target: 'pino-pretty', options: { colorize: true } }
      : undefined,
  redact: {
    paths: ['api_key', 'apiKey', 'token', 'key', '*.api_key', '*.token', 'headers.cookie'],
    censor: '***REDACTED***',
  },
});

export type { Logger };
