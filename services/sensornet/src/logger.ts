import pino, { stdTimeFunctions, type BaseLogger, type Logger, type LoggerOptions } from 'pino';

export type ServiceLogger = Pick<BaseLogger, 'info' | 'warn' | 'error' | 'debug'>;

export const createLoggerOptions = (level: string): LoggerOptions => ({
  level,
  base: undefined,
  timestamp: stdTimeFunctions.isoTime
});

export function createLogger(level: string, name?: string): Logger {
  return pino({ ...createLoggerOptions(level), name });
}
