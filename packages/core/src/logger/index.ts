/**
 * Pino logger for the workflow packages
 *
 * Contact details, outreach content and reply text are censored by path (see
 * ./redaction.ts). Pretty output in development, JSON elsewhere; silent under
 * test unless LOG_LEVEL is set.
 */

import pino, { type Logger, type LoggerOptions } from 'pino';

import { createCensor, REDACTION_PATHS } from './redaction.js';

export interface LoggerConfig {
  /** Module emitting the entries */
  name: string;
  level?: string;
  pretty?: boolean;
}

function defaultLevel(): string {
  const configured = process.env.LOG_LEVEL;
  if (configured) return configured;

  switch (process.env.NODE_ENV) {
    case 'test':
      return 'silent';
    case 'production':
      return 'info';
    default:
      return 'debug';
  }
}

export function createLogger(config: LoggerConfig): Logger {
  const env = process.env.NODE_ENV ?? 'development';
  const options: LoggerOptions = {
    name: config.name,
    level: config.level ?? defaultLevel(),
    base: { env },
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
    redact: { paths: REDACTION_PATHS, censor: createCensor },
  };

  if (config.pretty ?? env === 'development') {
    const transport = pino.transport({
      target: 'pino-pretty',
      options: { colorize: true, translateTime: 'SYS:standard', ignore: 'pid,hostname' },
    }) as pino.DestinationStream;
    return pino(options, transport);
  }

  return pino(options);
}

export type { Logger } from 'pino';
