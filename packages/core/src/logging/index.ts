/**
 * @fileoverview Logging exports
 */

export {
  SwitchyardLogger,
  getLogger,
  createLogger,
  resetLogger,
} from './logger.js';

export {
  withLoggingContext,
  getLoggingContext,
  type LoggingContext,
} from './log-context.js';

export {
  LOG_LEVELS,
  isLogLevel,
  type LogLevel,
  type LoggerOptions,
  type LogContext,
  type ISwitchyardLogger,
} from './types.js';
