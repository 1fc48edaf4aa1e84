import pino from 'pino';
import type { FastifyBaseLogger } from 'fastify';

export type Logger = FastifyBaseLogger;

const REDACT_PATHS = [
  'req.headers.authorization',
  'headers.authorization',
  'authorization',
  '*.authorization',
  'token',
  '*.token',
  'access_token',
  '*.access_token',
  'client_secret',
  '*.client_secret',
  'clientSecret',
  '*.clientSecret',
];

export interface LoggerOptions {
  level: string;
  pretty?: boolean;
}

/**
 * Root logger shared by Fastify and the relay services.
 * Pretty printing is only enabled for development.
 */
export function createLogger(options: LoggerOptions): Logger {
  return pino({
    level: options.level,
    redact: {
      paths: REDACT_PATHS,
      censor: '[REDACTED]',
    },
    transport: options.pretty
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'HH:MM:ss Z',
            ignore: 'pid,hostname',
          },
        }
      : undefined,
  });
}

/** Logger for tests and tools that do not want output. */
export function createSilentLogger(): Logger {
  return pino({ level: 'silent' });
}
