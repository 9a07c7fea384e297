import { CONTACT_PATTERN, DATE_PATTERN } from '../../shared/constants';
import { ValidationError } from './errors';

export function requireText(value: string | undefined | null, field: string): string {
  const trimmed = (value ?? '').trim();
  if (!trimmed) throw new ValidationError(`${field} is required`);
  return trimmed;
}

/** Fruit names are keys: trimmed and uppercased. */
export function normalizeFruit(value: string | undefined | null): string {
  return requireText(value, 'fruit').toUpperCase();
}

export function requireContact(value: string | undefined | null): string {
  const contact = (value ?? '').trim();
  if (!CONTACT_PATTERN.test(contact)) {
    throw new ValidationError('contact must be a 10-digit phone number');
  }
  return contact;
}

export function requireDate(value: string | undefined | null, field = 'date'): string {
  const date = (value ?? '').trim();
  const valid =
    DATE_PATTERN.test(date) &&
    !Number.isNaN(Date.parse(date)) &&
    // The parser rolls 2025-02-31 over to March; the round trip catches it
    new Date(date).toISOString().slice(0, 10) === date;
  if (!valid) {
    throw new ValidationError(`${field} must be a date in YYYY-MM-DD format`);
  }
  return date;
}

export function requirePositiveInt(value: number, field: string): number {
  if (!Number.isInteger(value) || value <= 0) {
    throw new ValidationError(`${field} must be a positive whole number`);
  }
  return value;
}

export function requireNonNegativeInt(value: number, field: string): number {
  if (!Number.isInteger(value) || value < 0) {
    throw new ValidationError(`${field} must be a whole number >= 0`);
  }
  return value;
}

export function requirePositiveAmount(value: number, field: string): number {
  if (!Number.isFinite(value) || value <= 0) {
    throw new ValidationError(`${field} must be greater than zero`);
  }
  return value;
}

export function requireNonNegativeAmount(value: number, field: string): number {
  if (!Number.isFinite(value) || value < 0) {
    throw new ValidationError(`${field} must be >= 0`);
  }
  return value;
}

export function requireId(value: number, field: string): number {
  if (!Number.isInteger(value) || value <= 0) {
    throw new ValidationError(`${field} must be a positive integer id`);
  }
  return value;
}
