import pino from 'pino';

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function resolveLogLevel(value: string | undefined): LogLevel {
  return isLogLevel(value) ? value : 'info';
}

export const logger = pino({
  name: 'newscheck',
  level: resolveLogLevel(process.env['LOG_LEVEL']),
  redact: {
    paths: ['apiKey', '*.apiKey', 'headers.authorization'],
    censor: '[redacted]',
  },
  transport:
    process.env['NODE_ENV'] === 'development'
      ? { target: 'pino/file', options: { destination: 1 } }
      : undefined,
});

/** Component names follow `<area>:<component>`, e.g. `verification:evidence-gatherer`. */
export function createChildLogger(component: string): pino.Logger {
  return logger.child({ component });
}
