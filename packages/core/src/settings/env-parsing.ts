/**
 * @fileoverview Environment parsing
 *
 * Environment variables arrive as strings. Each one is read through a zod
 * schema that both validates and converts it; a value the schema rejects is
 * logged and replaced by the fallback instead of failing startup.
 */

import { z, type ZodType, type ZodTypeDef } from 'zod';

export interface EnvParseLogger {
  warn: (message: string, context?: Record<string, unknown>) => void;
}

export interface EnvValueOptions<T> {
  /** Variable name, for the log line */
  name: string;
  fallback: T;
  logger?: EnvParseLogger;
}

/** A schema reading one environment string */
export type EnvSchema<T> = ZodType<T, ZodTypeDef, string>;

export interface IntegerBounds {
  min?: number;
  max?: number;
}

const INTEGER_PATTERN = /^-?\d+$/;
const TRUE_VALUES = new Set(['true', '1', 'yes', 'on']);
const FALSE_VALUES = new Set(['false', '0', 'no', 'off']);

/**
 * Decimal integer, optionally bounded. Rejects `1.5`, `1e3` and `12ms`.
 */
export function envInteger(bounds: IntegerBounds = {}): EnvSchema<number> {
  let value = z.number().safe('not a safe integer');
  if (bounds.min !== undefined) {
    value = value.min(bounds.min, `below minimum ${bounds.min}`);
  }
  if (bounds.max !== undefined) {
    value = value.max(bounds.max, `above maximum ${bounds.max}`);
  }
  return z.string().trim().regex(INTEGER_PATTERN, 'not an integer').transform(Number).pipe(value);
}

/**
 * true/false, 1/0, yes/no, on/off, in any case
 */
export const envBoolean: EnvSchema<boolean> = z
  .string()
  .trim()
  .toLowerCase()
  .refine((raw) => TRUE_VALUES.has(raw) || FALSE_VALUES.has(raw), 'not a boolean')
  .transform((raw) => TRUE_VALUES.has(raw));

export const envNonEmpty: EnvSchema<string> = z.string().trim().min(1, 'empty');

/**
 * Read an environment value through a schema.
 * Unset means the fallback; an invalid value is logged, then the fallback.
 */
export function parseEnvValue<T>(raw: string | undefined, schema: EnvSchema<T>, options: EnvValueOptions<T>): T {
  if (raw === undefined) {
    return options.fallback;
  }

  const parsed = schema.safeParse(raw);
  if (parsed.success) {
    return parsed.data;
  }

  options.logger?.warn('Invalid environment value, using fallback', {
    variable: options.name,
    value: raw,
    reason: parsed.error.errors[0]?.message ?? 'invalid',
    fallback: options.fallback,
  });
  return options.fallback;
}
