/**
 * @fileoverview Environment parsing helpers
 *
 * Strict parsing for environment overrides. An invalid value never throws;
 * it is reported through the optional logger and the fallback is used.
 */

export interface EnvParseLogger {
  warn: (message: string, context?: Record<string, unknown>) => void;
}

interface BaseEnvOptions<T> {
  name: string;
  fallback: T;
  logger?: EnvParseLogger;
}

export interface ParseEnvNumberOptions extends BaseEnvOptions<number> {
  min?: number;
  max?: number;
}

export type ParseEnvBooleanOptions = BaseEnvOptions<boolean>;

const TRUE_VALUES = new Set(['true', '1', 'yes', 'on']);
const FALSE_VALUES = new Set(['false', '0', 'no', 'off']);
const INTEGER_PATTERN = /^-?\d+$/;
const NUMBER_PATTERN = /^-?(\d+\.?\d*|\.\d+)$/;

function reject<T>(options: BaseEnvOptions<T>, raw: string, reason: string): T {
  options.logger?.warn('Invalid environment value, using fallback', {
    variable: options.name,
    value: raw,
    reason,
    fallback: options.fallback,
  });
  return options.fallback;
}

function checkBounds(value: number, options: ParseEnvNumberOptions): string | null {
  if (options.min !== undefined && value < options.min) {
    return `below_min_${options.min}`;
  }
  if (options.max !== undefined && value > options.max) {
    return `above_max_${options.max}`;
  }
  return null;
}

/**
 * Parse an integer environment value with fallback.
 */
export function parseEnvInteger(raw: string | undefined, options: ParseEnvNumberOptions): number {
  if (raw === undefined) return options.fallback;

  const normalized = raw.trim();
  if (!INTEGER_PATTERN.test(normalized)) {
    return reject(options, raw, 'not_an_integer');
  }
  const value = Number(normalized);
  if (!Number.isSafeInteger(value)) {
    return reject(options, raw, 'not_a_safe_integer');
  }
  const outOfBounds = checkBounds(value, options);
  return outOfBounds ? reject(options, raw, outOfBounds) : value;
}

/**
 * Parse a decimal environment value with fallback.
 */
export function parseEnvNumber(raw: string | undefined, options: ParseEnvNumberOptions): number {
  if (raw === undefined) return options.fallback;

  const normalized = raw.trim();
  if (!NUMBER_PATTERN.test(normalized)) {
    return reject(options, raw, 'not_a_number');
  }
  const value = Number(normalized);
  const outOfBounds = checkBounds(value, options);
  return outOfBounds ? reject(options, raw, outOfBounds) : value;
}

/**
 * Parse a boolean environment value with fallback.
 */
export function parseEnvBoolean(raw: string | undefined, options: ParseEnvBooleanOptions): boolean {
  if (raw === undefined) return options.fallback;

  const normalized = raw.trim().toLowerCase();
  if (TRUE_VALUES.has(normalized)) return true;
  if (FALSE_VALUES.has(normalized)) return false;
  return reject(options, raw, 'invalid_boolean');
}
