import { Decimal } from 'decimal.js';

/**
 * Round to `places` decimal digits, ties away from zero.
 * decimal.js calls this mode ROUND_HALF_UP.
 */
export function roundHalfAwayFromZero(value: Decimal, places: number): Decimal {
  return value.toDecimalPlaces(places, Decimal.ROUND_HALF_UP);
}

/**
 * Parse a user- or database-supplied decimal value.
 * Returns null for anything that is not a finite number.
 */
export function parseDecimal(value: Decimal.Value): Decimal | null {
  try {
    const parsed = new Decimal(typeof value === 'string' ? value.trim() : value);
    return parsed.isFinite() ? parsed : null;
  } catch {
    // decimal.js throws on malformed strings
    return null;
  }
}

