import pino from 'pino';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'silent'];

function levelFromEnv(): LogLevel {
  const raw = (process.env.LOG_LEVEL || 'info').toLowerCase();
  return LEVELS.find((l) => l === raw) ?? 'info';
}

// stdout carries the report; structured logs go to stderr.
const baseLogger = pino(
  {
    level: levelFromEnv(),
    base: { service: 'example-harness' },
    redact: { paths: ['env.*', 'value'], censor: '[redacted]' },
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  },
  pino.destination(2)
);

export type Logger = pino.Logger;

export function createLogger(component: string, level?: LogLevel): Logger {
  const logger = baseLogger.child({ component });
  if (level) logger.level = level;
  return logger;
}

export const logger = createLogger('harness');
