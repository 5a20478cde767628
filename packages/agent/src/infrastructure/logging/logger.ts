/**
 * @fileoverview Centralized logging infrastructure
 *
 * Uses pino for structured logging with:
 * - Configurable log levels
 * - JSON output for production
 * - Pretty printing for development
 * - Context-aware child loggers
 *
 * All output goes to stderr so stdout stays free for whatever hosts the engine.
 */

import pino, { type Logger, type LoggerOptions as PinoOptions } from 'pino';
import { isLogLevel, type LogLevel, type LoggerOptions, type LogContext } from './types.js';

// =============================================================================
// Logger Factory
// =============================================================================

function resolveLevel(options: LoggerOptions): LogLevel {
  if (options.level) return options.level;
  const fromEnv = process.env.LOG_LEVEL;
  // Default to 'warn' so a running server stays quiet unless asked
  return isLogLevel(fromEnv) ? fromEnv : 'warn';
}

function createPinoLogger(options: LoggerOptions = {}): Logger {
  const level = resolveLevel(options);
  const env = process.env.NODE_ENV;
  const pretty = options.pretty ?? (env !== 'production' && env !== 'test');

  const pinoOptions: PinoOptions = {
    level,
    name: options.name ?? 'tiller',
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
      bindings: (bindings) => ({
        pid: bindings.pid,
        host: bindings.hostname,
        name: bindings.name,
      }),
    },
  };

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

  return pino(pinoOptions, pino.destination(2));
}

// =============================================================================
// Logger Wrapper Class
// =============================================================================

type LogPayload = string | Record<string, unknown>;

export class TillerLogger {
  private readonly pino: Logger;
  private readonly context: LogContext;

  constructor(options: LoggerOptions = {}, context: LogContext = {}, base?: Logger) {
    this.pino = base ?? createPinoLogger(options);
    this.context = context;
  }

  /**
   * Create a child logger with additional context.
   * Children share the parent's pino destination.
   */
  child(context: LogContext): TillerLogger {
    return new TillerLogger({}, { ...this.context, ...context }, this.pino.child(context));
  }

  get bindings(): LogContext {
    return { ...this.context };
  }

  get level(): string {
    return this.pino.level;
  }

  /**
   * Normalize log arguments and dispatch to pino.
   * Handles (msg), (msg, data), (data, msg) and (msg, error).
   */
  private dispatch(level: LogLevel, first: LogPayload, second?: LogPayload | Error): void {
    if (typeof first === 'string') {
      if (second instanceof Error) {
        this.pino[level]({ err: second }, first);
      } else if (typeof second === 'object' && second !== null) {
        this.pino[level](second, first);
      } else {
        this.pino[level](first);
      }
      return;
    }
    this.pino[level](first, typeof second === 'string' ? second : '');
  }

  trace(first: LogPayload, second?: LogPayload): void {
    this.dispatch('trace', first, second);
  }

  debug(first: LogPayload, second?: LogPayload): void {
    this.dispatch('debug', first, second);
  }

  info(first: LogPayload, second?: LogPayload): void {
    this.dispatch('info', first, second);
  }

  warn(first: LogPayload, second?: LogPayload | Error): void {
    this.dispatch('warn', first, second);
  }

  error(first: LogPayload, second?: LogPayload | Error): void {
    this.dispatch('error', first, second);
  }

  fatal(first: LogPayload, second?: LogPayload | Error): void {
    this.dispatch('fatal', first, second);
  }
}

// =============================================================================
// Singleton Logger
// =============================================================================

let defaultLogger: TillerLogger | null = null;

export function getLogger(options?: LoggerOptions): TillerLogger {
  if (!defaultLogger) {
    defaultLogger = new TillerLogger(options);
  }
  return defaultLogger;
}

/**
 * Create a component-specific logger
 */
export function createLogger(component: string, context?: LogContext): TillerLogger {
  return getLogger().child({ component, ...context });
}

/**
 * Reset the default logger (for testing)
 */
export function resetLogger(): void {
  defaultLogger = null;
}
