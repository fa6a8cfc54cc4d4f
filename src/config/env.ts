import { ConfigValidationError } from './errors.js';
import { parseDuration, formatDuration } from './duration.js';

export type EnvSource = Record<string, string | undefined>;

export interface ReadOptions<T> {
  required?: boolean;
  default?: T;
  min?: T;
  max?: T;
}

const TRUE_VALUES = ['1', 't', 'T', 'TRUE', 'true', 'True'];
const FALSE_VALUES = ['0', 'f', 'F', 'FALSE', 'false', 'False'];

function lookup(env: EnvSource, key: string, required: boolean | undefined): string | undefined {
  const value = env[key];

  if (value === undefined || value === '') {
    if (required) {
      throw new ConfigValidationError(key, 'is required');
    }
    return undefined;
  }

  return value;
}

function checkRange(key: string, value: number, options: ReadOptions<number>, format: (n: number) => string = String): void {
  if (options.min !== undefined && value < options.min) {
    throw new ConfigValidationError(key, `must be >= ${format(options.min)}, got ${format(value)}`);
  }
  if (options.max !== undefined && value > options.max) {
    throw new ConfigValidationError(key, `must be <= ${format(options.max)}, got ${format(value)}`);
  }
}

function withDefault<T>(key: string, options: ReadOptions<T>): T {
  if (options.default === undefined) {
    throw new ConfigValidationError(key, 'is required');
  }
  return options.default;
}

export function readString(env: EnvSource, key: string, options: ReadOptions<string> = {}): string {
  const raw = lookup(env, key, options.required);
  return raw ?? withDefault(key, options);
}

export function readInt(env: EnvSource, key: string, options: ReadOptions<number> = {}): number {
  const raw = lookup(env, key, options.required);
  if (raw === undefined) return withDefault(key, options);

  if (!/^[+-]?\d+$/.test(raw.trim())) {
    throw new ConfigValidationError(key, `invalid integer "${raw}"`);
  }

  const value = parseInt(raw, 10);
  checkRange(key, value, options);
  return value;
}

export function readFloat(env: EnvSource, key: string, options: ReadOptions<number> = {}): number {
  const raw = lookup(env, key, options.required);
  if (raw === undefined) return withDefault(key, options);

  const value = Number(raw.trim());
  if (raw.trim() === '' || Number.isNaN(value)) {
    throw new ConfigValidationError(key, `invalid float "${raw}"`);
  }

  checkRange(key, value, options);
  return value;
}

export function readBool(env: EnvSource, key: string, options: ReadOptions<boolean> = {}): boolean {
  const raw = lookup(env, key, options.required);
  if (raw === undefined) return withDefault(key, options);

  if (TRUE_VALUES.includes(raw)) return true;
  if (FALSE_VALUES.includes(raw)) return false;

  throw new ConfigValidationError(key, `invalid boolean "${raw}"`);
}

/**
 * Reads a duration variable. Defaults, bounds and the returned value are
 * all in milliseconds.
 */
export function readDuration(env: EnvSource, key: string, options: ReadOptions<number> = {}): number {
  const raw = lookup(env, key, options.required);
  if (raw === undefined) return withDefault(key, options);

  const value = parseDuration(raw);
  if (value === null) {
    throw new ConfigValidationError(key, `invalid duration "${raw}"`);
  }

  checkRange(key, value, options, formatDuration);
  return value;
}

export function readEnum<T extends string>(
  env: EnvSource,
  key: string,
  allowed: readonly T[],
  options: ReadOptions<T> = {}
): T {
  const raw = lookup(env, key, options.required);
  if (raw === undefined) return withDefault(key, options);

  const match = allowed.find(candidate => candidate === raw.toLowerCase());
  if (!match) {
    throw new ConfigValidationError(key, `invalid value "${raw}" (must be one of: ${allowed.join(', ')})`);
  }
  return match;
}
