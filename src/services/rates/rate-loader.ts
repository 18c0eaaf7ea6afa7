import pino from 'pino';
import { withTransaction } from '../../db/pool.js';
import {
  findCurrencyByCode,
  findOverlappingRate,
  insertCurrency,
  insertRate,
} from '../exchange-rate/rate-repository.js';
import { RateConflictError } from '../../utils/errors.js';
import type { RateFileRow } from './rate-file.js';

const logger = pino({ name: 'rate-loader' });

export interface LoadSummary {
  currenciesCreated: number;
  ratesInserted: number;
}

/**
 * Write parsed rate rows in one transaction.
 *
 * Currencies are created on first sight. A window overlapping one already
 * stored for the same currency (including one inserted earlier in this run)
 * aborts the whole load with a RateConflictError.
 */
export async function loadRates(rows: RateFileRow[]): Promise<LoadSummary> {
  const summary = await withTransaction(async (client) => {
    const currencyIds = new Map<string, number>();
    let currenciesCreated = 0;

    for (const row of rows) {
      let currencyId = currencyIds.get(row.currencyCode);
      if (currencyId === undefined) {
        const existing = await findCurrencyByCode(row.currencyCode, client);
        const currency = existing ?? (await insertCurrency(row.currencyCode, row.currencyName, client));
        if (!existing) currenciesCreated++;
        currencyId = currency.id;
        currencyIds.set(row.currencyCode, currencyId);
      }

      const overlap = await findOverlappingRate(currencyId, row.validFrom, row.validTo, client);
      if (overlap) {
        throw new RateConflictError(
          row.currencyCode,
          { id: overlap.id, validFrom: overlap.valid_from, validTo: overlap.valid_to },
          { validFrom: row.validFrom, validTo: row.validTo },
        );
      }

      await insertRate(currencyId, row.unitsPerGbp, row.validFrom, row.validTo, client);
    }

    return { currenciesCreated, ratesInserted: rows.length };
  });

  logger.info(summary, 'Rates loaded');
  return summary;
}
