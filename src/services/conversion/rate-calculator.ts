import { Decimal } from 'decimal.js';
import type { CurrencyMetadata } from '../currency/currency-metadata.js';
import type { RateStore } from '../exchange-rate/rate-store.js';
import { CurrencyNotFoundError, InvalidAmountError, type CurrencyRole } from '../../utils/errors.js';
import { parseDecimal, roundHalfAwayFromZero } from '../../utils/decimal.js';

export const BASE_CURRENCY = 'GBP';

/** Decimal digits kept on a cross-rate before it is applied to an amount. */
export const RATE_PRECISION = 7;

const ONE = new Decimal(1);

export interface ConversionResult {
  destinationAmount: Decimal;
  exchangeRate: Decimal;
}

export interface RateCalculator {
  getRate(sourceCode: string, destinationCode: string): Promise<Decimal>;
  convert(sourceCode: string, destinationCode: string, amount: Decimal.Value): Promise<ConversionResult>;
}

export interface RateCalculatorDeps {
  rateStore: RateStore;
  currencyMetadata: CurrencyMetadata;
  baseCurrency?: string;
}

export function normalizeCurrencyCode(code: string): string {
  return code.trim().toUpperCase();
}

/**
 * Cross-rates by triangulation through the base currency.
 *
 * Every stored rate is "units of X per 1 base unit", so the rate from A to B
 * is perB / perA with perBase fixed at 1. Source is resolved before
 * destination, which decides the code named when both are unknown.
 */
export function createRateCalculator(deps: RateCalculatorDeps): RateCalculator {
  const { rateStore, currencyMetadata } = deps;
  const baseCurrency = normalizeCurrencyCode(deps.baseCurrency ?? BASE_CURRENCY);

  async function ratePerBase(code: string, role: CurrencyRole): Promise<Decimal> {
    if (code === baseCurrency) return ONE;

    const lookup = await rateStore.currentRatePerBase(code);
    if (!lookup.found) {
      throw new CurrencyNotFoundError(code, lookup.reason, role);
    }
    return lookup.unitsPerBase;
  }

  async function getRate(sourceCode: string, destinationCode: string): Promise<Decimal> {
    const source = normalizeCurrencyCode(sourceCode);
    const destination = normalizeCurrencyCode(destinationCode);

    if (source === destination) return ONE;

    const sourcePerBase = await ratePerBase(source, 'source');
    const destinationPerBase = await ratePerBase(destination, 'destination');
    return destinationPerBase.div(sourcePerBase);
  }

  async function convert(
    sourceCode: string,
    destinationCode: string,
    amount: Decimal.Value,
  ): Promise<ConversionResult> {
    const sourceAmount = parseDecimal(amount);
    if (!sourceAmount || (sourceAmount.isNegative() && !sourceAmount.isZero())) {
      throw new InvalidAmountError(String(amount));
    }

    // Round before multiplying so the reported rate is the one applied
    const exchangeRate = roundHalfAwayFromZero(await getRate(sourceCode, destinationCode), RATE_PRECISION);
    const decimalPlaces = currencyMetadata.fractionDigits(normalizeCurrencyCode(destinationCode));
    const destinationAmount = roundHalfAwayFromZero(sourceAmount.mul(exchangeRate), decimalPlaces);

    return { destinationAmount, exchangeRate };
  }

  return { getRate, convert };
}
