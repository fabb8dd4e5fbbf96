/**
 * Shared pino logger. stdout carries the path alone, so every log line goes to stderr.
 */
import { createRequire } from 'node:module';
import pino, { type Logger, type LoggerOptions } from 'pino';

const require = createRequire(import.meta.url);

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

/**
 * `LINKPATH_LOG_LEVEL` wins over `LOG_LEVEL`; unknown names are ignored.
 * Defaults to `info`.
 */
export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  for (const raw of [env.LINKPATH_LOG_LEVEL, env.LOG_LEVEL]) {
    const level = raw?.trim().toLowerCase();
    if (level && isLogLevel(level)) return level;
  }
  return 'info';
}

function canPrettyPrint(env: NodeJS.ProcessEnv): boolean {
  if (env.NODE_ENV !== 'development') return false;
  try {
    require.resolve('pino-pretty');
    return true;
  } catch {
    return false;
  }
}

export function createLogger(env: NodeJS.ProcessEnv = process.env): Logger {
  const options: LoggerOptions = {
    level: resolveLogLevel(env),
    base: { service: 'linkpath' },
    formatters: {
      level: (label) => ({ level: label }),
    },
  };

  if (canPrettyPrint(env)) {
    return pino({
      ...options,
      transport: {
        target: 'pino-pretty',
        options: { colorize: true, ignore: 'pid,hostname,service', destination: 2 },
      },
    });
  }
  return pino(options, pino.destination(2));
}

export const logger = createLogger();
