import pino from 'pino';

export type SDKLogger = pino.Logger;

/**
 * SDK logger: silent unless debug is enabled, so host applications only see
 * output when they ask for it.
 */
export function createSDKLogger(debug: boolean, bindings: Record<string, unknown> = {}): SDKLogger {
  return pino({
    name: 'handoff-sdk',
    level: debug ? 'debug' : 'silent',
    base: { component: 'handoff-sdk', ...bindings },
    timestamp: pino.stdTimeFunctions.isoTime,
    redact: {
      paths: ['accessToken', 'headers.Authorization', '*.token', 'token'],
      censor: '[REDACTED]',
    },
  });
}
