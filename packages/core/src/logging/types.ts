/**
 * @fileoverview Logging types shared by the logger and its consumers
 */

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = [
  'trace',
  'debug',
  'info',
  'warn',
  'error',
  'fatal',
  'silent',
];

export interface LoggerOptions {
  level?: LogLevel;
  name?: string;
  /** Pretty-print through pino-pretty instead of emitting JSON lines */
  pretty?: boolean;
  /** Write JSON lines here instead of stderr; disables pretty printing */
  destination?: { write(line: string): void };
}

export interface LogContext {
  component?: string;
  [key: string]: unknown;
}

/**
 * Narrow interface the rest of the codebase depends on, so callers can
 * pass a stub in tests.
 */
export interface ISwitchyardLogger {
  trace(msgOrData: string | Record<string, unknown>, second?: string | Record<string, unknown>): void;
  debug(msgOrData: string | Record<string, unknown>, second?: string | Record<string, unknown>): void;
  info(msgOrData: string | Record<string, unknown>, second?: string | Record<string, unknown>): void;
  warn(msgOrData: string | Record<string, unknown>, second?: string | Record<string, unknown>): void;
  error(msgOrData: string | Record<string, unknown>, second?: string | Error | Record<string, unknown>): void;
  fatal(msgOrData: string | Record<string, unknown>, second?: string | Error | Record<string, unknown>): void;
  child(context: LogContext): ISwitchyardLogger;
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}
