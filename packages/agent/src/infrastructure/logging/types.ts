/**
 * @fileoverview Logging types
 */

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'];

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && LOG_LEVELS.some(level => level === value);
}

export interface LoggerOptions {
  level?: LogLevel;
  /** Pretty-print through pino-pretty instead of emitting JSON lines */
  pretty?: boolean;
  name?: string;
}

export interface LogContext {
  component?: string;
  sessionId?: string;
  [key: string]: unknown;
}
