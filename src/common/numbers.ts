import { Decimal } from 'decimal.js';

const INTEGER_RE = /^[+-]?\d+$/;
const DECIMAL_RE = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Parses a base-10 integer. Returns null for anything else, including
 * fractional values and integers outside the safe range.
 */
export const parseInteger = (raw: string): number | null => {
  const value = raw.trim();
  if (!INTEGER_RE.test(value)) return null;

  const parsed = Number.parseInt(value, 10);
  return Number.isSafeInteger(parsed) ? parsed : null;
};

/**
 * Parses a plain decimal literal (optionally with exponent) into a Decimal.
 * Hex, binary, NaN and Infinity literals are rejected.
 */
export const parseDecimal = (raw: string): Decimal | null => {
  const value = raw.trim();
  if (!DECIMAL_RE.test(value)) return null;

  const parsed = new Decimal(value);
  return parsed.isFinite() ? parsed : null;
};
