import Decimal from 'decimal.js';
import { parseDecimal } from './decimal';
import { isIsoDate } from './date';
import { BadRequestError } from './errors';

export type ValidationResult<T> = { valid: true; data: T } | { valid: false; errors: string[] };

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function hasField(body: Record<string, unknown>, field: string): boolean {
  return Object.prototype.hasOwnProperty.call(body, field) && body[field] !== undefined;
}

// Bounds of a PostgreSQL INTEGER column
export const MAX_INT = 2147483647;
export const MIN_INT = -2147483648;

function toPositiveInt(value: unknown): number | null {
  let parsed: number | null = null;
  if (typeof value === 'number' && Number.isInteger(value)) {
    parsed = value;
  } else if (typeof value === 'string' && /^\d+$/.test(value.trim())) {
    parsed = parseInt(value.trim(), 10);
  }
  return parsed !== null && parsed > 0 && parsed <= MAX_INT ? parsed : null;
}

export function readString(value: unknown, field: string, errors: string[], maxLength: number): string | undefined {
  if (typeof value !== 'string' || value.trim().length === 0) {
    errors.push(`${field} is required`);
    return undefined;
  }
  const trimmed = value.trim();
  if (trimmed.length > maxLength) {
    errors.push(`${field} must be at most ${maxLength} characters`);
    return undefined;
  }
  return trimmed;
}

export function readNullableString(value: unknown, field: string, errors: string[]): string | null | undefined {
  if (value === null) return null;
  if (typeof value !== 'string') {
    errors.push(`${field} must be a string`);
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}

export function readId(value: unknown, field: string, errors: string[]): number | undefined {
  const id = toPositiveInt(value);
  if (id === null) {
    errors.push(`${field} must be a positive integer`);
    return undefined;
  }
  return id;
}

export function readNullableId(value: unknown, field: string, errors: string[]): number | null | undefined {
  if (value === null) return null;
  return readId(value, field, errors);
}

export function readInteger(value: unknown, field: string, errors: string[]): number | undefined {
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    errors.push(`${field} must be an integer`);
    return undefined;
  }
  if (value < MIN_INT || value > MAX_INT) {
    errors.push(`${field} must be between ${MIN_INT} and ${MAX_INT}`);
    return undefined;
  }
  return value;
}

export function readBoolean(value: unknown, field: string, errors: string[]): boolean | undefined {
  if (typeof value !== 'boolean') {
    errors.push(`${field} must be a boolean`);
    return undefined;
  }
  return value;
}

interface DecimalBounds {
  min?: Decimal.Value;
  max?: Decimal.Value;
  places: number;
}

/**
 * Reads a decimal given as a number or string and returns it as a
 * fixed-point string with `places` decimals.
 */
export function readDecimalString(
  value: unknown,
  field: string,
  errors: string[],
  bounds: DecimalBounds,
): string | undefined {
  const parsed = parseDecimal(value);
  if (!parsed) {
    errors.push(`${field} must be a decimal number`);
    return undefined;
  }
  if (parsed.decimalPlaces() > bounds.places) {
    errors.push(`${field} must have at most ${bounds.places} decimal places`);
    return undefined;
  }
  if (bounds.min !== undefined && parsed.lessThan(bounds.min)) {
    errors.push(`${field} must be at least ${bounds.min}`);
    return undefined;
  }
  if (bounds.max !== undefined && parsed.greaterThan(bounds.max)) {
    errors.push(`${field} must be at most ${bounds.max}`);
    return undefined;
  }
  return parsed.toFixed(bounds.places);
}

export function readNullableDate(value: unknown, field: string, errors: string[]): string | null | undefined {
  if (value === null || value === '') return null;
  if (typeof value !== 'string' || !isIsoDate(value)) {
    errors.push(`${field} must be a date in YYYY-MM-DD format`);
    return undefined;
  }
  return value;
}

export function parseIdParam(value: string, label: string): number {
  const id = toPositiveInt(value);
  if (id === null) {
    throw new BadRequestError(`Invalid ${label} id: ${value}`);
  }
  return id;
}

export function parseQueryId(value: unknown, field: string): number | undefined {
  if (value === undefined || value === '') return undefined;
  const id = toPositiveInt(value);
  if (id === null) {
    throw new BadRequestError(`${field} must be a positive integer`);
  }
  return id;
}

export function parseQueryBoolean(value: unknown): boolean | undefined {
  if (value === 'true') return true;
  if (value === 'false') return false;
  return undefined;
}
