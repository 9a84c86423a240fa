import pino from 'pino';
import type { Logger, LoggerOptions } from 'pino';
import { stdTimeFunctions } from 'pino';

export const createLoggerOptions = (level: string): LoggerOptions => ({
  level,
  base: undefined,
  timestamp: stdTimeFunctions.isoTime
});

export const createLogger = (level: string): Logger => pino(createLoggerOptions(level));
