import type { Decimal } from 'decimal.js';

export type RateLookup =
  | { found: true; unitsPerBase: Decimal }
  | { found: false; reason: 'unknown-currency' | 'no-current-rate' };

/**
 * Source of "units of a currency per 1 unit of the base currency".
 * Only the rate valid at `at` (default: now) is ever returned.
 */
export interface RateStore {
  currentRatePerBase(code: string, at?: Date): Promise<RateLookup>;
}
