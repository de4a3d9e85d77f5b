import { Request } from 'express';
import { ApiError } from '../../api/errors';
import { parseDate } from '../date/date';

type Fields = Record<string, unknown>;

function isFields(value: unknown): value is Fields {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Request body as a plain object; anything else (missing, array, string) reads as empty
 */
export function getBody(request: Request): Fields {
  return isFields(request.body) ? request.body : {};
}

/**
 * Single string query parameter, ignoring repeated or nested values
 */
export function getQueryString(request: Request, name: string): string | undefined {
  const value = request.query[name];
  return typeof value === 'string' && value !== '' ? value : undefined;
}

/**
 * Extracts the account id route parameter
 * @throws ApiError 400 when missing
 */
export function getAccountId(request: Request): string {
  const accountId = request.params.accountId;
  if (!accountId || accountId.trim() === '') {
    throw new ApiError('Account ID is required', 400);
  }
  return accountId;
}

/**
 * Parses a strictly positive amount (a budget limit)
 * @throws ApiError 400 for anything else
 */
export function parseAmount(value: unknown, field: string): number {
  const amount = typeof value === 'string' ? Number(value.replace(/,/g, '')) : value;
  if (typeof amount !== 'number' || !Number.isFinite(amount) || amount <= 0) {
    throw new ApiError(`${field} must be a number greater than 0`, 400);
  }
  return amount;
}

/**
 * Parses a finite number that may be zero (spend figures, limits under evaluation)
 * @throws ApiError 400 for anything else
 */
export function parseNumber(value: unknown, field: string): number {
  const number = typeof value === 'string' && value.trim() !== '' ? Number(value) : value;
  if (typeof number !== 'number' || !Number.isFinite(number)) {
    throw new ApiError(`${field} must be a number`, 400);
  }
  return number;
}

/**
 * @throws ApiError 400 unless the value is a non-negative integer
 */
export function parseCount(value: unknown, field: string): number {
  const count = parseNumber(value, field);
  if (!Number.isInteger(count) || count < 0) {
    throw new ApiError(`${field} must be a non-negative integer`, 400);
  }
  return count;
}

/**
 * Parses a required date field ("YYYY-MM-DD" or ISO timestamp)
 * @throws ApiError 400 when missing or invalid
 */
export function parseDateField(value: unknown, field: string): Date {
  if (typeof value !== 'string') {
    throw new ApiError(`${field} is required`, 400);
  }
  try {
    return parseDate(value);
  } catch (_) {
    throw new ApiError(`${field} must be a valid date`, 400);
  }
}

export function parseOptionalDateField(value: unknown, field: string): Date | undefined {
  return value === undefined || value === null ? undefined : parseDateField(value, field);
}

export function parseOptionalString(value: unknown): string | undefined {
  return typeof value === 'string' && value.trim() !== '' ? value : undefined;
}
