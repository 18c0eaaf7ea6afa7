import { currencyMetadata } from '../currency/currency-metadata.js';
import { pgRateStore } from '../exchange-rate/rate-repository.js';
import { createRateCalculator } from './rate-calculator.js';

export {
  BASE_CURRENCY,
  RATE_PRECISION,
  createRateCalculator,
  normalizeCurrencyCode,
  type ConversionResult,
  type RateCalculator,
} from './rate-calculator.js';

export const rateCalculator = createRateCalculator({
  rateStore: pgRateStore,
  currencyMetadata,
});
