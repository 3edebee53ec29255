/**
 * Structured logging with pino
 */
import { createRequire } from 'node:module';
import pino from 'pino';

const require = createRequire(import.meta.url);

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/** WEBSIFT_LOG_LEVEL wins over LOG_LEVEL; unknown values fall back to info. */
export function resolveLogLevel(env: NodeJS.ProcessEnv): LogLevel {
  const raw = (env.WEBSIFT_LOG_LEVEL || env.LOG_LEVEL)?.trim().toLowerCase();
  return raw && isLogLevel(raw) ? raw : 'info';
}

function prettyAvailable(): boolean {
  try {
    require.resolve('pino-pretty');
    return true;
  } catch (e) {
    console.debug('pino-pretty not available, using JSON logs:', e);
    return false;
  }
}

/**
 * Build a logger writing to stderr, so records on stdout stay parseable.
 * Development runs get pino-pretty when it is installed.
 */
export function createLogger(env: NodeJS.ProcessEnv = process.env): pino.Logger {
  const options: pino.LoggerOptions = {
    level: resolveLogLevel(env),
    formatters: {
      level: (label: string) => ({ level: label }),
    },
    base: { service: 'websift' },
  };

  if (env.NODE_ENV === 'development' && prettyAvailable()) {
    return pino({
      ...options,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
          destination: 2,
        },
      },
    });
  }
  return pino(options, pino.destination(2));
}

export const logger = createLogger();
