/**
 * Environment Variable Parsing Utilities
 *
 * Strict parsers for service startup: a malformed or out-of-range value
 * throws ValidationError naming the variable. An unset (or empty) variable
 * yields the default, which may be undefined so a lower configuration layer
 * keeps its value.
 */

import { ValidationError } from '@xrt-miner/types';

export type EnvSource = Readonly<Record<string, string | undefined>>;

function checkRange(name: string, parsed: number, min?: number, max?: number): void {
  if (min !== undefined && max !== undefined) {
    if (parsed < min || parsed > max) {
      throw new ValidationError(`Invalid ${name}: ${parsed} is out of range [${min}, ${max}]`, 'env', name);
    }
  } else if (min !== undefined && parsed < min) {
    throw new ValidationError(`Invalid ${name}: ${parsed} is below minimum ${min}`, 'env', name);
  } else if (max !== undefined && parsed > max) {
    throw new ValidationError(`Invalid ${name}: ${parsed} is above maximum ${max}`, 'env', name);
  }
}

/**
 * Parse and validate an integer environment variable (strict mode).
 *
 * @example
 * ```typescript
 * const batch = parseEnvInt('BATCH_SIZE', 20, 1, 500);
 * ```
 */
export function parseEnvInt(name: string, defaultValue: number, min?: number, max?: number, env?: EnvSource): number;
export function parseEnvInt(
  name: string,
  defaultValue: undefined,
  min?: number,
  max?: number,
  env?: EnvSource
): number | undefined;
export function parseEnvInt(
  name: string,
  defaultValue: number | undefined,
  min?: number,
  max?: number,
  env: EnvSource = process.env
): number | undefined {
  const raw = env[name]?.trim();
  if (!raw) return defaultValue;

  const parsed = Number(raw);
  if (!Number.isInteger(parsed)) {
    throw new ValidationError(`Invalid ${name}: "${raw}" is not a valid integer`, 'env', name);
  }
  checkRange(name, parsed, min, max);
  return parsed;
}

/**
 * Parse and validate a decimal environment variable (strict mode).
 */
export function parseEnvFloat(name: string, defaultValue: number, min?: number, max?: number, env?: EnvSource): number;
export function parseEnvFloat(
  name: string,
  defaultValue: undefined,
  min?: number,
  max?: number,
  env?: EnvSource
): number | undefined;
export function parseEnvFloat(
  name: string,
  defaultValue: number | undefined,
  min?: number,
  max?: number,
  env: EnvSource = process.env
): number | undefined {
  const raw = env[name]?.trim();
  if (!raw) return defaultValue;

  const parsed = Number(raw);
  if (!Number.isFinite(parsed)) {
    throw new ValidationError(`Invalid ${name}: "${raw}" is not a valid number`, 'env', name);
  }
  checkRange(name, parsed, min, max);
  return parsed;
}
