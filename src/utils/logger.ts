import pino, { type Logger, type LoggerOptions } from 'pino';

export type { Logger } from 'pino';

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;
type LogLevel = (typeof LOG_LEVELS)[number];

function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

export function getLogLevel(): LogLevel {
  const level = process.env.LOG_LEVEL?.toLowerCase();
  return level && isLogLevel(level) ? level : 'info';
}

/**
 * Logger options shared by the Fastify server and the standalone root logger,
 * so request logs and job logs end up in the same format.
 */
export function getLoggerOptions(): LoggerOptions {
  return {
    level: getLogLevel(),
    transport:
      process.env.NODE_ENV === 'development'
        ? {
            target: 'pino-pretty',
            options: {
              translateTime: 'HH:MM:ss Z',
              ignore: 'pid,hostname',
            },
          }
        : undefined,
  };
}

let rootLogger: Logger | null = null;

function getRootLogger(): Logger {
  if (!rootLogger) {
    rootLogger = pino({
      ...getLoggerOptions(),
      base: { service: 'trait-extraction' },
    });
  }
  return rootLogger;
}

export function createLogger(module: string): Logger {
  return getRootLogger().child({ module });
}
