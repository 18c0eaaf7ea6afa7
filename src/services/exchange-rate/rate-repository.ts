import pino from 'pino';
import { pool, type Queryable } from '../../db/pool.js';
import { parseDecimal } from '../../utils/decimal.js';
import type { RateLookup, RateStore } from './rate-store.js';

const logger = pino({ name: 'exchange-rate' });

export interface CurrencyRow {
  id: number;
  code: string;
  name: string;
}

export interface RateWindowRow {
  id: number;
  valid_from: Date;
  valid_to: Date;
}

/**
 * Currency plus its rate valid at `$2`. A missing currency yields no row;
 * a currency without a current window yields a row with a null rate.
 */
const CURRENT_RATE_SQL = `
  SELECT c.id, r.units_per_gbp
    FROM currencies c
    LEFT JOIN LATERAL (
      SELECT er.units_per_gbp
        FROM exchange_rates er
       WHERE er.currency_id = c.id
         AND er.valid_from <= $2
         AND er.valid_to >= $2
       ORDER BY er.valid_from DESC
       LIMIT 1
    ) r ON TRUE
   WHERE c.code = $1`;

export async function findCurrentRate(code: string, at: Date = new Date(), db: Queryable = pool): Promise<RateLookup> {
  const { rows } = await db.query<{ id: number; units_per_gbp: string | null }>(CURRENT_RATE_SQL, [code, at]);

  if (rows.length === 0) {
    return { found: false, reason: 'unknown-currency' };
  }

  const raw = rows[0].units_per_gbp;
  if (raw === null) {
    return { found: false, reason: 'no-current-rate' };
  }

  const unitsPerBase = parseDecimal(raw);
  if (!unitsPerBase || unitsPerBase.lte(0)) {
    logger.warn({ code, raw }, 'Stored rate is not a positive decimal, treating as missing');
    return { found: false, reason: 'no-current-rate' };
  }

  return { found: true, unitsPerBase };
}

export async function findCurrencyByCode(code: string, db: Queryable = pool): Promise<CurrencyRow | null> {
  const { rows } = await db.query<CurrencyRow>('SELECT id, code, name FROM currencies WHERE code = $1', [code]);
  return rows[0] ?? null;
}

export async function insertCurrency(code: string, name: string, db: Queryable = pool): Promise<CurrencyRow> {
  const { rows } = await db.query<CurrencyRow>(
    `INSERT INTO currencies (code, name) VALUES ($1, $2) RETURNING id, code, name`,
    [code, name],
  );
  return rows[0];
}

export async function findOverlappingRate(
  currencyId: number,
  validFrom: Date,
  validTo: Date,
  db: Queryable = pool,
): Promise<RateWindowRow | null> {
  const { rows } = await db.query<RateWindowRow>(
    `SELECT id, valid_from, valid_to FROM exchange_rates
       WHERE currency_id = $1 AND valid_from <= $3 AND valid_to >= $2
       ORDER BY valid_from
       LIMIT 1`,
    [currencyId, validFrom, validTo],
  );
  return rows[0] ?? null;
}

export async function insertRate(
  currencyId: number,
  unitsPerGbp: string,
  validFrom: Date,
  validTo: Date,
  db: Queryable = pool,
): Promise<number> {
  const { rows } = await db.query<{ id: number }>(
    `INSERT INTO exchange_rates (currency_id, units_per_gbp, valid_from, valid_to)
       VALUES ($1, $2, $3, $4) RETURNING id`,
    [currencyId, unitsPerGbp, validFrom, validTo],
  );
  return rows[0].id;
}

/** RateStore backed by the shared pool. */
export const pgRateStore: RateStore = {
  currentRatePerBase: (code, at) => findCurrentRate(code, at),
};
