import { describe, expect, it } from 'vitest';
import { Decimal } from 'decimal.js';
import {
  createRateCalculator,
  normalizeCurrencyCode,
  RATE_PRECISION,
} from '../../services/conversion/rate-calculator.js';
import { createCurrencyMetadata } from '../../services/currency/currency-metadata.js';
import type { RateLookup, RateStore } from '../../services/exchange-rate/rate-store.js';
import { CurrencyNotFoundError, InvalidAmountError } from '../../utils/errors.js';

// ── Test fixtures ────────────────────────────────────────────────────────

const metadata = createCurrencyMetadata({
  GBP: { name: 'British Pound', fractionDigits: 2 },
  USD: { name: 'US Dollar', fractionDigits: 2 },
  EUR: { name: 'Euro', fractionDigits: 2 },
  JPY: { name: 'Japanese Yen', fractionDigits: 0 },
  KWD: { name: 'Kuwaiti Dinar', fractionDigits: 3 },
  CHF: { name: 'Swiss Franc', fractionDigits: 2 },
});

/**
 * In-memory RateStore. `null` marks a known currency with no current rate.
 * Every lookup is recorded so tests can assert which codes were queried.
 */
function memoryStore(rates: Record<string, string | null>): RateStore & { lookups: string[] } {
  const lookups: string[] = [];
  return {
    lookups,
    async currentRatePerBase(code: string): Promise<RateLookup> {
      lookups.push(code);
      if (!(code in rates)) return { found: false, reason: 'unknown-currency' };
      const rate = rates[code];
      if (rate === null) return { found: false, reason: 'no-current-rate' };
      return { found: true, unitsPerBase: new Decimal(rate) };
    },
  };
}

function calculatorFor(rates: Record<string, string | null>) {
  const rateStore = memoryStore(rates);
  return { rateStore, calculator: createRateCalculator({ rateStore, currencyMetadata: metadata }) };
}

const TABLE = { USD: '1.25', EUR: '1.15', JPY: '150.00', KWD: '0.3832' };

// ── getRate ──────────────────────────────────────────────────────────────

describe('getRate', () => {
  it('returns exactly 1 for self-conversion without touching the store', async () => {
    const { calculator, rateStore } = calculatorFor(TABLE);

    expect((await calculator.getRate('EUR', 'EUR')).toString()).toBe('1');
    expect((await calculator.getRate('GBP', 'GBP')).toString()).toBe('1');
    expect((await calculator.getRate('XXX', 'xxx')).toString()).toBe('1');
    expect(rateStore.lookups).toEqual([]);
  });

  it('returns the stored rate when converting from the base currency', async () => {
    const { calculator, rateStore } = calculatorFor(TABLE);

    const rate = await calculator.getRate('GBP', 'EUR');

    expect(rate.toString()).toBe('1.15');
    expect(rateStore.lookups).toEqual(['EUR']);
  });

  it('inverts the stored rate when converting to the base currency', async () => {
    const { calculator, rateStore } = calculatorFor(TABLE);

    const rate = await calculator.getRate('USD', 'GBP');

    expect(rate.toString()).toBe('0.8');
    expect(rateStore.lookups).toEqual(['USD']);
  });

  it('divides destination by source for a cross-rate', async () => {
    const { calculator, rateStore } = calculatorFor(TABLE);

    const rate = await calculator.getRate('USD', 'EUR');

    expect(rate.toString()).toBe('0.92');
    expect(rateStore.lookups).toEqual(['USD', 'EUR']);
  });

  it('normalizes codes before comparing or looking them up', async () => {
    const { calculator, rateStore } = calculatorFor(TABLE);

    const rate = await calculator.getRate(' usd ', 'jpy');

    expect(rate.toString()).toBe('120');
    expect(rateStore.lookups).toEqual(['USD', 'JPY']);
  });

  it('names the source when both codes are unknown', async () => {
    const { calculator, rateStore } = calculatorFor(TABLE);

    await expect(calculator.getRate('XXX', 'ABC')).rejects.toBeInstanceOf(CurrencyNotFoundError);
    await expect(calculator.getRate('XXX', 'ABC')).rejects.toThrow('Source currency "XXX" not found');
    await expect(calculator.getRate('XXX', 'ABC')).rejects.toMatchObject({
      currencyCode: 'XXX',
      role: 'source',
      reason: 'unknown-currency',
    });
    expect(rateStore.lookups).toEqual(['XXX', 'XXX', 'XXX']);
  });

  it('names the destination when only the destination is unknown', async () => {
    const { calculator } = calculatorFor(TABLE);

    await expect(calculator.getRate('USD', 'ABC')).rejects.toThrow('Destination currency "ABC" not found');
    await expect(calculator.getRate('GBP', 'ABC')).rejects.toMatchObject({
      currencyCode: 'ABC',
      role: 'destination',
    });
  });

  it('treats a known currency without a current rate as not found', async () => {
    const { calculator } = calculatorFor({ ...TABLE, CHF: null });

    await expect(calculator.getRate('CHF', 'USD')).rejects.toThrow('No current rate found for source currency "CHF"');
    await expect(calculator.getRate('USD', 'CHF')).rejects.toThrow('No current rate found for destination currency "CHF"');
    await expect(calculator.getRate('USD', 'CHF')).rejects.toMatchObject({
      role: 'destination',
      reason: 'no-current-rate',
    });
  });

  it('is symmetric within the rate rounding tolerance', async () => {
    const { calculator } = calculatorFor(TABLE);
    const round = (d: Decimal) => d.toDecimalPlaces(RATE_PRECISION, Decimal.ROUND_HALF_UP);

    const there = round(await calculator.getRate('USD', 'EUR'));
    const back = round(await calculator.getRate('EUR', 'USD'));

    expect(back.toString()).toBe('1.0869565');
    expect(there.mul(back).minus(1).abs().lt('1e-6')).toBe(true);
  });
});

// ── convert ──────────────────────────────────────────────────────────────

describe('convert', () => {
  it('converts USD to EUR at a rounded cross-rate', async () => {
    const { calculator } = calculatorFor(TABLE);

    const result = await calculator.convert('USD', 'EUR', 100);

    expect(result.exchangeRate.toFixed(7)).toBe('0.9200000');
    expect(result.destinationAmount.toFixed(2)).toBe('92.00');
  });

  it('rounds to whole units for a currency without a minor unit', async () => {
    const { calculator } = calculatorFor(TABLE);

    const result = await calculator.convert('USD', 'JPY', '100.00');

    expect(result.exchangeRate.toFixed(7)).toBe('120.0000000');
    expect(result.destinationAmount.toString()).toBe('12000');
    expect(result.destinationAmount.isInteger()).toBe(true);
  });

  it('converts from the base currency at the stored rate', async () => {
    const { calculator } = calculatorFor(TABLE);

    const result = await calculator.convert('GBP', 'EUR', '10.00');

    expect(result.exchangeRate.toString()).toBe('1.15');
    expect(result.destinationAmount.toFixed(2)).toBe('11.50');
  });

  it('converts into the base currency at the inverted rate', async () => {
    const { calculator } = calculatorFor(TABLE);

    const result = await calculator.convert('USD', 'GBP', 10);

    expect(result.exchangeRate.toFixed(7)).toBe('0.8000000');
    expect(result.destinationAmount.toFixed(2)).toBe('8.00');
  });

  it('reports the rate rounded to seven places and applies that same rate', async () => {
    const { calculator } = calculatorFor({ CHF: '1.12345675' });

    const result = await calculator.convert('GBP', 'CHF', 1000);

    // Tie at the eighth digit rounds away from zero
    expect(result.exchangeRate.toString()).toBe('1.1234568');
    expect(result.destinationAmount.toFixed(2)).toBe('1123.46');
  });

  it('rounds destination ties away from zero instead of following binary floats', async () => {
    const { calculator } = calculatorFor(TABLE);

    // 1.005 is 1.00499999… as a double
    const result = await calculator.convert('USD', 'USD', '1.005');

    expect(result.exchangeRate.toString()).toBe('1');
    expect(result.destinationAmount.toFixed(2)).toBe('1.01');
  });

  it('rounds a half yen up', async () => {
    const { calculator } = calculatorFor(TABLE);

    const result = await calculator.convert('USD', 'JPY', '1.0125');

    expect(result.destinationAmount.toString()).toBe('122');
  });

  it('keeps three decimal places for a three-digit currency', async () => {
    const { calculator } = calculatorFor(TABLE);

    const result = await calculator.convert('GBP', 'KWD', '10.0005');

    expect(result.destinationAmount.toString()).toBe('3.832');
  });

  it('allows a zero amount and still reports the rate', async () => {
    const { calculator } = calculatorFor(TABLE);

    const result = await calculator.convert('USD', 'EUR', 0);

    expect(result.destinationAmount.isZero()).toBe(true);
    expect(result.exchangeRate.toString()).toBe('0.92');
  });

  it('reports the base rate of any currency rounded to seven places', async () => {
    const { calculator } = calculatorFor({ USD: '1.234567891' });

    const result = await calculator.convert('GBP', 'USD', 1);

    expect(result.exchangeRate.toString()).toBe('1.2345679');
  });

  it('rejects a negative amount before any lookup', async () => {
    const { calculator, rateStore } = calculatorFor(TABLE);

    await expect(calculator.convert('USD', 'EUR', -0.01)).rejects.toBeInstanceOf(InvalidAmountError);
    await expect(calculator.convert('XXX', 'ABC', '-5')).rejects.toBeInstanceOf(InvalidAmountError);
    expect(rateStore.lookups).toEqual([]);
  });

  it('rejects an amount that is not a number', async () => {
    const { calculator } = calculatorFor(TABLE);

    await expect(calculator.convert('USD', 'EUR', 'ten')).rejects.toThrow('Amount must be a non-negative number');
  });

  it('surfaces CurrencyNotFound from either side', async () => {
    const { calculator } = calculatorFor(TABLE);

    await expect(calculator.convert('USD', 'CHF', 10)).rejects.toThrow('Destination currency "CHF" not found');
  });

  it('gives identical results for concurrent calls', async () => {
    const { calculator } = calculatorFor(TABLE);

    const results = await Promise.all([1, 2, 3].map(() => calculator.convert('EUR', 'JPY', '42.42')));
    const amounts = results.map((r) => r.destinationAmount.toString());

    expect(new Set(amounts).size).toBe(1);
  });
});

describe('normalizeCurrencyCode', () => {
  it('trims and upper-cases', () => {
    expect(normalizeCurrencyCode(' eur\n')).toBe('EUR');
  });
});
