import { pino, stdTimeFunctions } from 'pino';
import type { Logger, LoggerOptions } from 'pino';
import { logLevel, type AppConfig } from './config.js';

export type { Logger };

export const loggerOptions = (config: AppConfig) =>
  ({
    level: logLevel(config),
    base: undefined,
    timestamp: stdTimeFunctions.isoTime,
    redact: {
      paths: ['rootToken', 'unsealKeys', 'token', 'req.headers.authorization'],
      censor: '[redacted]'
    }
  }) satisfies LoggerOptions;

export function createLogger(config: AppConfig): Logger {
  return pino(loggerOptions(config));
}
