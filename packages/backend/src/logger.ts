import pino, { type Logger, type LoggerOptions } from 'pino';

export type { Logger };

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

export const isLogLevel = (value: string): value is LogLevel =>
  (LOG_LEVELS as readonly string[]).includes(value);

const createLoggerOptions = (level: LogLevel): LoggerOptions => ({
  level,
  base: {
    pid: process.pid
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  formatters: {
    level: (label: string) => ({ level: label })
  }
});

/**
 * Structured JSON logger writing to stderr so stdout stays free for tooling.
 */
export const createLogger = (level: LogLevel = 'info'): Logger =>
  pino(createLoggerOptions(level), pino.destination(2));

export const createSilentLogger = (): Logger => pino({ level: 'silent' });
