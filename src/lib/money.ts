/**
 * Money Helpers
 *
 * Every amount, total and limit is a decimal.js Decimal. Amounts are
 * limited to the NUMERIC(10,2) column they are stored in.
 */

import Decimal from 'decimal.js';
import { ValidationError } from './errors';

export const ZERO = new Decimal(0);

/** Largest value a NUMERIC(10,2) column holds */
export const MAX_AMOUNT = new Decimal('99999999.99');

const AMOUNT_SCALE = 2;

// Plain decimal notation; rejects the hex, binary and octal forms decimal.js would accept
const DECIMAL_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)(e[+-]?\d+)?$/i;

/**
 * Parse an amount or limit supplied by a caller
 *
 * Accepts decimal strings ("45.50") and JSON numbers.
 *
 * @throws ValidationError if the value is not a positive amount with at most two decimal places
 */
export function parseAmount(input: string | number, field = 'amount'): Decimal {
  const raw = typeof input === 'number' ? String(input) : input.trim();

  if (raw === '') {
    throw new ValidationError(`${field} is required`);
  }
  if (!DECIMAL_PATTERN.test(raw)) {
    throw new ValidationError(`${field} must be a number`, { received: raw });
  }

  const value = new Decimal(raw);
  assertAmount(value, field);
  return value;
}

/**
 * Check that a Decimal is storable as an amount: positive, finite, at most
 * two decimal places and within the column range
 *
 * @throws ValidationError
 */
export function assertAmount(value: Decimal, field = 'amount'): void {
  const received = value.toString();

  if (!value.isFinite()) {
    throw new ValidationError(`${field} must be a finite number`, { received });
  }
  if (value.lte(ZERO)) {
    throw new ValidationError(`${field} must be greater than 0`, { received });
  }
  if (value.decimalPlaces() > AMOUNT_SCALE) {
    throw new ValidationError(`${field} must have at most ${AMOUNT_SCALE} decimal places`, { received });
  }
  if (value.gt(MAX_AMOUNT)) {
    throw new ValidationError(`${field} must not exceed ${formatAmount(MAX_AMOUNT)}`, { received });
  }
}

/**
 * Format a Decimal with exactly two decimal places
 *
 * @example
 * formatAmount(new Decimal('45.5')) // "45.50"
 */
export function formatAmount(value: Decimal): string {
  return value.toFixed(AMOUNT_SCALE);
}

/**
 * Sum a list of Decimals
 */
export function sum(values: readonly Decimal[]): Decimal {
  return values.reduce((acc, v) => acc.plus(v), ZERO);
}
