import pino, { type LevelWithSilent, type Logger } from 'pino';

export const SERVICE_NAME = 'phonebook';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const satisfies readonly LevelWithSilent[];

export type LogLevel = (typeof LOG_LEVELS)[number];

export function createLogger(level: LogLevel = 'info'): Logger {
  return pino({
    level,
    base: { service: SERVICE_NAME },
    redact: {
      remove: true,
      paths: ['req.headers.authorization', 'req.headers.cookie', "res.headers['set-cookie']"],
    },
  });
}
