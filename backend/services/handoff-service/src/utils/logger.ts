import pino from 'pino';

const LOG_LEVEL = process.env.LOG_LEVEL || (process.env.NODE_ENV === 'test' ? 'silent' : 'info');
const LOG_FORMAT = process.env.LOG_FORMAT || (process.env.NODE_ENV === 'development' ? 'pretty' : 'json');

/**
 * Replaced with '[REDACTED]' wherever they appear. Transfer tokens are
 * bearer credentials, so they are treated like passwords.
 */
export const REDACT_FIELDS = [
  'email',
  'token',
  'transferToken',
  'transfer_token',
  'authorization',
  'accessToken',
  'secret',

  '*.email',
  '*.token',
  '*.transferToken',
  '*.transfer_token',
  '*.authorization',
  '*.accessToken',
  '*.secret',

  'req.headers.authorization',
  'req.headers.cookie',
  'req.headers["idempotency-key"]',
  'req.body.email',
  'req.body.transfer_token',
];

export const logger = pino({
  level: LOG_LEVEL,
  transport:
    LOG_FORMAT === 'pretty'
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'HH:MM:ss Z',
            ignore: 'pid,hostname',
          },
        }
      : undefined,
  base: {
    service: 'handoff-service',
    environment: process.env.NODE_ENV || 'development',
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  formatters: {
    level: (label) => {
      return { level: label };
    },
  },
  redact: {
    paths: REDACT_FIELDS,
    censor: '[REDACTED]',
  },
});

export type Logger = pino.Logger;

/**
 * Child logger for background jobs, gateways and other non-request work
 */
export function createContextLogger(context: Record<string, string | number | boolean>): Logger {
  return logger.child(context);
}
