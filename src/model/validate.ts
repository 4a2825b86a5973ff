import { validationError } from '../shared/index.js';

export function requireInteger(field: string, value: unknown, expected: string): number {
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    throw validationError(`${field} must be an integer ${expected}`, { field, expected, actual: value });
  }
  return value;
}

export function requireIntegerInRange(
  field: string,
  value: unknown,
  min: number,
  max: number = Number.POSITIVE_INFINITY
): number {
  const expected = Number.isFinite(max) ? `in [${min}, ${max}]` : `>= ${min}`;
  const n = requireInteger(field, value, expected);
  if (n < min || n > max) {
    throw validationError(`${field} (${n}) must be ${expected}`, { field, expected, actual: n });
  }
  return n;
}

export function requireNonEmptyString(field: string, value: unknown): string {
  if (typeof value !== 'string' || value.length === 0) {
    throw validationError(`${field} must be a non-empty string`, {
      field,
      expected: 'non-empty string',
      actual: value,
    });
  }
  return value;
}
