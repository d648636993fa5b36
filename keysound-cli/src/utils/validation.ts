import { ValidationError } from './errors.js';
import { isLogLevel, LOG_LEVELS, type LogLevel } from './logger.js';

export function validateMilliseconds(value: string | undefined, fieldName: string, fallback: number): number {
  if (value === undefined) return fallback;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new ValidationError(`Invalid ${fieldName}: ${value}`, {
      field: fieldName,
      expected: 'a positive whole number of milliseconds',
    });
  }
  return parsed;
}

export function validateLogLevel(value: string | undefined, fallback: LogLevel): LogLevel {
  if (value === undefined) return fallback;
  const normalized = value.trim().toLowerCase();
  if (!isLogLevel(normalized)) {
    throw new ValidationError(`Invalid log level: ${value}`, { allowed: LOG_LEVELS });
  }
  return normalized;
}

export function validateRequired(value: string | undefined, fieldName: string): string {
  if (!value || value.trim() === '') {
    throw new ValidationError(`Missing required field: ${fieldName}`);
  }
  return value;
}
