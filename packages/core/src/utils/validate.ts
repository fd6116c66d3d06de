// packages/core/src/utils/validate.ts — Fail-fast argument checks

import { ValidationError } from './errors.js';

/** Throw a ValidationError when `value` is missing or blank. */
export function requireNonEmpty(value: string | undefined | null, field: string): string {
  if (value === undefined || value === null || value.trim().length === 0) {
    throw new ValidationError(`${field} not specified`, field);
  }
  return value;
}

export function requireIntInRange(value: number, field: string, min: number, max = Number.MAX_SAFE_INTEGER): number {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new ValidationError(`${field} must be an integer between ${min} and ${max}, got ${value}`, field);
  }
  return value;
}
