import { describe, expect, it, vi } from 'vitest';
import {
  parseEnvBoolean,
  parseEnvInteger,
  parseEnvNumber,
  type EnvParseLogger,
} from '../env-parsing.js';

describe('env parsing', () => {
  it('parses valid integers with bounds', () => {
    expect(parseEnvInteger('8080', { name: 'TILLER_PORT', fallback: 9000, min: 1, max: 65535 })).toBe(8080);
  });

  it('falls back for invalid integers and logs a warning', () => {
    const logger: EnvParseLogger = { warn: vi.fn() };
    const value = parseEnvInteger('abc', { name: 'TILLER_PORT', fallback: 8080, min: 1, max: 65535, logger });

    expect(value).toBe(8080);
    expect(logger.warn).toHaveBeenCalledWith('Invalid environment value, using fallback', {
      variable: 'TILLER_PORT',
      value: 'abc',
      reason: 'not_an_integer',
      fallback: 8080,
    });
  });

  it('rejects integers outside the bounds', () => {
    const logger: EnvParseLogger = { warn: vi.fn() };
    expect(parseEnvInteger('0', { name: 'limit', fallback: 5, min: 1, logger })).toBe(5);
    expect(parseEnvInteger('70000', { name: 'port', fallback: 1, max: 65535, logger })).toBe(1);
    expect(logger.warn).toHaveBeenCalledTimes(2);
  });

  it('returns the fallback without logging when the variable is unset', () => {
    const logger: EnvParseLogger = { warn: vi.fn() };
    expect(parseEnvInteger(undefined, { name: 'limit', fallback: 3, logger })).toBe(3);
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it('parses decimals', () => {
    expect(parseEnvNumber('0.75', { name: 'ratio', fallback: 0.5, min: 0, max: 1 })).toBe(0.75);
    expect(parseEnvNumber('.5', { name: 'ratio', fallback: 0.1 })).toBe(0.5);
    expect(parseEnvNumber('1.5', { name: 'ratio', fallback: 0.1, max: 1 })).toBe(0.1);
    expect(parseEnvNumber('half', { name: 'ratio', fallback: 0.2 })).toBe(0.2);
  });

  it('parses booleans with fallback for invalid values', () => {
    const logger: EnvParseLogger = { warn: vi.fn() };

    expect(parseEnvBoolean('true', { name: 'TILLER_EPHEMERAL', fallback: false, logger })).toBe(true);
    expect(parseEnvBoolean(' ON ', { name: 'TILLER_EPHEMERAL', fallback: false, logger })).toBe(true);
    expect(parseEnvBoolean('0', { name: 'TILLER_EPHEMERAL', fallback: true, logger })).toBe(false);
    expect(parseEnvBoolean('maybe', { name: 'TILLER_EPHEMERAL', fallback: true, logger })).toBe(true);
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });
});
