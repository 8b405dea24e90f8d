import pino from 'pino';

/**
 * Application logger using Pino
 *
 * - Structured JSON logging in production
 * - Pretty printing in development
 * - Silent under the test runner unless LOG_LEVEL says otherwise
 */

const nodeEnv = process.env.NODE_ENV || 'development';
const isDevelopment = nodeEnv === 'development';
const defaultLevel = nodeEnv === 'test' ? 'silent' : 'info';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

// Accepts the upper-case names older deployments used (WARNING, CRITICAL)
const LEVEL_ALIASES: Record<string, LogLevel> = {
  warning: 'warn',
  critical: 'fatal',
};

export function normalizeLogLevel(value: string | undefined): LogLevel | null {
  if (!value) return null;
  const normalized = value.trim().toLowerCase();
  const aliased = LEVEL_ALIASES[normalized];
  if (aliased) return aliased;
  return LOG_LEVELS.find((level) => level === normalized) ?? null;
}

export const logger = pino({
  level: normalizeLogLevel(process.env.LOG_LEVEL ?? process.env.LOGLEVEL) ?? defaultLevel,

  // Pretty print in development, JSON in production
  transport: isDevelopment ? {
    target: 'pino-pretty',
    options: {
      colorize: true,
      translateTime: 'HH:MM:ss',
      ignore: 'pid,hostname',
      singleLine: false,
    },
  } : undefined,

  base: {
    env: nodeEnv,
  },
});

export type Logger = pino.Logger;

/**
 * Create a child logger with specific context.
 * Children copy the root level when created, so create them after setLogLevel().
 */
export function createLogger(context: Record<string, unknown>): Logger {
  return logger.child(context);
}

export function setLogLevel(level: LogLevel): void {
  logger.level = level;
}
