/**
 * Input validation utilities
 * @module utils/validation
 */

/**
 * Validation error with details
 */
export class ValidationError extends Error {
  constructor(
    message: string,
    public field: string,
    public value: unknown
  ) {
    super(`${field}: ${message}`);
    this.name = 'ValidationError';
  }
}

/**
 * Validate that a value is a finite number
 */
export function validateFiniteNumber(value: number, name: string): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new ValidationError('must be a finite number', name, value);
  }
  return value;
}

/**
 * Validate that a value is a finite number greater than zero
 */
export function validatePositiveNumber(value: number, name: string): number {
  validateFiniteNumber(value, name);
  if (value <= 0) {
    throw new ValidationError('must be greater than zero', name, value);
  }
  return value;
}

/**
 * Validate an integer with a lower bound (inclusive)
 */
export function validateInteger(value: number, name: string, min: number): number {
  if (!Number.isInteger(value)) {
    throw new ValidationError('must be an integer', name, value);
  }
  if (value < min) {
    throw new ValidationError(`must be at least ${min}`, name, value);
  }
  return value;
}

/**
 * Parse a numeric command-line or file value
 */
export function parseNumber(raw: string, name: string): number {
  const trimmed = raw.trim();
  const value = trimmed === '' ? NaN : Number(trimmed);
  if (!Number.isFinite(value)) {
    throw new ValidationError(`"${raw}" is not a number`, name, raw);
  }
  return value;
}
