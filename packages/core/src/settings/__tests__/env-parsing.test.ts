/**
 * @fileoverview Tests for environment parsing
 */

import { describe, it, expect, vi } from 'vitest';
import { envBoolean, envInteger, envNonEmpty, parseEnvValue } from '../env-parsing.js';

describe('parseEnvValue', () => {
  it('should return the fallback when unset', () => {
    expect(parseEnvValue(undefined, envInteger(), { name: 'X', fallback: 30 })).toBe(30);
  });

  it('should log the first issue and fall back on an invalid value', () => {
    const logger = { warn: vi.fn() };

    expect(parseEnvValue('soon', envInteger(), { name: 'SWITCHYARD_RPC_TIMEOUT_MS', fallback: 30, logger })).toBe(30);
    expect(logger.warn).toHaveBeenCalledWith('Invalid environment value, using fallback', {
      variable: 'SWITCHYARD_RPC_TIMEOUT_MS',
      value: 'soon',
      reason: 'not an integer',
      fallback: 30,
    });
  });
});

describe('envInteger', () => {
  it('should parse a trimmed integer', () => {
    expect(envInteger().parse(' 2500 ')).toBe(2500);
    expect(envInteger().parse('-3')).toBe(-3);
  });

  it.each([
    ['12ms', 'not an integer'],
    ['1.5', 'not an integer'],
    ['1e3', 'not an integer'],
    ['', 'not an integer'],
    ['99999999999999999999', 'not a safe integer'],
  ])('should reject %j as %s', (raw, reason) => {
    const result = envInteger().safeParse(raw);

    expect(result.success ? undefined : result.error.errors[0]?.message).toBe(reason);
  });

  it('should enforce bounds', () => {
    const port = envInteger({ min: 1, max: 65535 });

    expect(port.parse('8545')).toBe(8545);
    expect(port.safeParse('0').error?.errors[0]?.message).toBe('below minimum 1');
    expect(port.safeParse('70000').error?.errors[0]?.message).toBe('above maximum 65535');
  });
});

describe('envBoolean', () => {
  it.each(['true', '1', 'YES', ' on '])('should read %j as true', (raw) => {
    expect(envBoolean.parse(raw)).toBe(true);
  });

  it.each(['false', '0', 'No', 'off'])('should read %j as false', (raw) => {
    expect(envBoolean.parse(raw)).toBe(false);
  });

  it('should fall back on anything else', () => {
    const logger = { warn: vi.fn() };

    expect(parseEnvValue('maybe', envBoolean, { name: 'B', fallback: true, logger })).toBe(true);
    expect(logger.warn).toHaveBeenCalledWith(
      'Invalid environment value, using fallback',
      expect.objectContaining({ reason: 'not a boolean' })
    );
  });
});

describe('envNonEmpty', () => {
  it('should trim and reject blank values', () => {
    expect(envNonEmpty.parse(' 0.0.0.0 ')).toBe('0.0.0.0');
    expect(envNonEmpty.safeParse('  ').success).toBe(false);
  });
});
