import { pino, type Logger, type LoggerOptions } from 'pino';

export type { Logger };

export interface LoggerSettings {
  level: string;
  pretty: boolean;
}

// Same shape as the Fastify logger options the server has always used
export function buildLoggerOptions(settings: LoggerSettings): LoggerOptions {
  return {
    level: settings.level,
    ...(settings.pretty && {
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss Z',
          ignore: 'pid,hostname',
        },
      },
    }),
  };
}

export function createLogger(settings: LoggerSettings): Logger {
  return pino(buildLoggerOptions(settings));
}

let rootLogger: Logger = pino({
  level: process.env.NODE_ENV === 'test' ? 'silent' : process.env.LOG_LEVEL || 'info',
});

export function getLogger(): Logger {
  return rootLogger;
}

export function setLogger(logger: Logger): void {
  rootLogger = logger;
}

/** A logger that drops everything; handy for tests and library callers. */
export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}
