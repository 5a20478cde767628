/**
 * @fileoverview Logging exports
 */

export {
  TillerLogger,
  getLogger,
  createLogger,
  resetLogger,
} from './logger.js';
export { isLogLevel, LOG_LEVELS, type LogLevel, type LoggerOptions, type LogContext } from './types.js';
