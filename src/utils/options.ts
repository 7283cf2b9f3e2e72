/**
 * Readers for the opaque engine option mappings. A present value of the wrong type is
 * reported instead of being silently ignored.
 */
import { createInvalidConfigError } from '@/utils/error-handling';

function describe(value: unknown): string {
  return Array.isArray(value) ? 'array' : value === null ? 'null' : typeof value;
}

export function readString(options: Record<string, unknown>, key: string): string | undefined {
  const value = options[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'string') {
    throw createInvalidConfigError(`Option "${key}" must be a string, got ${describe(value)}.`);
  }
  return value;
}

export function readNumber(options: Record<string, unknown>, key: string): number | undefined {
  const value = options[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw createInvalidConfigError(`Option "${key}" must be a number, got ${describe(value)}.`);
  }
  return value;
}

export function readBoolean(options: Record<string, unknown>, key: string): boolean | undefined {
  const value = options[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'boolean') {
    throw createInvalidConfigError(`Option "${key}" must be a boolean, got ${describe(value)}.`);
  }
  return value;
}
