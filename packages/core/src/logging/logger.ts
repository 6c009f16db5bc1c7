/**
 * @fileoverview Centralized logging infrastructure for Switchyard
 *
 * Uses pino for structured logging with:
 * - Configurable log levels
 * - JSON output for production
 * - Pretty printing for development
 * - Context-aware child loggers
 * - AsyncLocalStorage fields merged into every line
 */

import pino from 'pino';
import { getLoggingContext } from './log-context.js';
import {
  isLogLevel,
  type ISwitchyardLogger,
  type LogContext,
  type LogLevel,
  type LoggerOptions,
} from './types.js';

export type { LogLevel, LoggerOptions, LogContext } from './types.js';

// =============================================================================
// Logger Factory
// =============================================================================

function levelFromEnv(): LogLevel | undefined {
  const raw = process.env.LOG_LEVEL?.trim().toLowerCase();
  return raw && isLogLevel(raw) ? raw : undefined;
}

function prettyByDefault(): boolean {
  const env = process.env.NODE_ENV;
  return env !== 'production' && env !== 'test';
}

/**
 * Create a configured pino logger instance
 */
function createPinoLogger(options: LoggerOptions = {}): pino.Logger {
  // 'warn' keeps request-level debug lines out of normal operation.
  // LOG_LEVEL=debug shows every dispatch.
  const level = options.level ?? levelFromEnv() ?? 'warn';
  const pretty = options.pretty ?? prettyByDefault();

  const pinoOptions: pino.LoggerOptions = {
    level,
    name: options.name ?? 'switchyard',
    timestamp: pino.stdTimeFunctions.isoTime,
    mixin: () => ({ ...getLoggingContext() }),
    formatters: {
      level: (label) => ({ level: label }),
      // applied to child bindings as well, so keep every other field
      bindings: ({ hostname, ...rest }) => ({ ...rest, host: hostname }),
    },
  };

  if (options.destination) {
    return pino(pinoOptions, options.destination);
  }

  if (pretty) {
    return pino({
      ...pinoOptions,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss.l',
          ignore: 'pid,hostname',
          destination: 2,
        },
      },
    });
  }

  // stdout belongs to whatever embeds the service
  return pino(pinoOptions, pino.destination(2));
}

// =============================================================================
// Logger Wrapper Class
// =============================================================================

type PinoLevel = Exclude<LogLevel, 'silent'>;

export class SwitchyardLogger implements ISwitchyardLogger {
  private readonly pino: pino.Logger;
  private readonly context: LogContext;

  constructor(options: LoggerOptions | pino.Logger = {}, context: LogContext = {}) {
    this.pino = isPinoLogger(options) ? options : createPinoLogger(options);
    this.context = context;
  }

  /**
   * Create a child logger with additional context.
   * Reuses the parent's pino destination.
   */
  child(context: LogContext): SwitchyardLogger {
    return new SwitchyardLogger(this.pino.child(context), { ...this.context, ...context });
  }

  get bindings(): LogContext {
    return { ...this.context };
  }

  /**
   * Change the threshold of this logger. Child loggers created afterwards
   * inherit it; existing children keep their own.
   */
  setLevel(level: LogLevel): void {
    this.pino.level = level;
  }

  /**
   * Normalize log arguments and hand them to pino.
   * Handles (msg), (msg, data), (data, msg) and (msg, error).
   */
  private dispatch(
    level: PinoLevel,
    msgOrData: string | Record<string, unknown>,
    second?: string | Error | Record<string, unknown>
  ): void {
    if (typeof msgOrData === 'string') {
      if (second instanceof Error) {
        this.pino[level]({ err: second }, msgOrData);
      } else if (typeof second === 'object') {
        this.pino[level](second, msgOrData);
      } else {
        this.pino[level](msgOrData);
      }
      return;
    }

    this.pino[level](msgOrData, typeof second === 'string' ? second : '');
  }

  trace(msgOrData: string | Record<string, unknown>, second?: string | Record<string, unknown>): void {
    this.dispatch('trace', msgOrData, second);
  }

  debug(msgOrData: string | Record<string, unknown>, second?: string | Record<string, unknown>): void {
    this.dispatch('debug', msgOrData, second);
  }

  info(msgOrData: string | Record<string, unknown>, second?: string | Record<string, unknown>): void {
    this.dispatch('info', msgOrData, second);
  }

  warn(msgOrData: string | Record<string, unknown>, second?: string | Record<string, unknown>): void {
    this.dispatch('warn', msgOrData, second);
  }

  /**
   * Supports (msg), (msg, data), (msg, error) and (data, msg)
   */
  error(msgOrData: string | Record<string, unknown>, second?: string | Error | Record<string, unknown>): void {
    this.dispatch('error', msgOrData, second);
  }

  fatal(msgOrData: string | Record<string, unknown>, second?: string | Error | Record<string, unknown>): void {
    this.dispatch('fatal', msgOrData, second);
  }
}

function isPinoLogger(value: LoggerOptions | pino.Logger): value is pino.Logger {
  return 'child' in value && typeof value.child === 'function';
}

// =============================================================================
// Singleton Logger
// =============================================================================

let defaultLogger: SwitchyardLogger | null = null;

/**
 * Get the default logger instance
 */
export function getLogger(options?: LoggerOptions): SwitchyardLogger {
  if (!defaultLogger) {
    defaultLogger = new SwitchyardLogger(options);
  }
  return defaultLogger;
}

/**
 * Create a component-specific logger
 */
export function createLogger(component: string, context?: LogContext): SwitchyardLogger {
  return getLogger().child({ component, ...context });
}

/**
 * Reset the default logger (for testing)
 */
export function resetLogger(): void {
  defaultLogger = null;
}
