import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import { currencyMetadata as defaultMetadata, type CurrencyMetadata } from '../currency/currency-metadata.js';
import { parseDecimal } from '../../utils/decimal.js';
import { CurrencyNotFoundError, RateFileError } from '../../utils/errors.js';

export interface RateWindow {
  validFrom: Date;
  validTo: Date;
}

export interface RateFileRow extends RateWindow {
  currencyCode: string;
  currencyName: string;
  /** Kept as the original decimal string so no precision is lost on insert. */
  unitsPerGbp: string;
}

export interface ParseRateFileOptions {
  /** Replace every row's window, e.g. to serve an old published table as current. */
  validityOverride?: RateWindow;
  currencyMetadata?: CurrencyMetadata;
}

interface ColumnMap {
  code: string;
  name: string | null;
  rate: string;
  from: string | null;
  to: string | null;
}

const recordsSchema = z.array(z.record(z.string()));

// numeric(15, 8) leaves seven integer digits
const MAX_UNITS_PER_GBP = 1e7;

const DATE_TIME = /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2})$/;
const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
const UK_DATE = /^(\d{2})\/(\d{2})\/(\d{4})$/;

function utcDate(year: number, month: number, day: number, h: number, m: number, s: number): Date | null {
  const date = new Date(Date.UTC(year, month - 1, day, h, m, s));
  const roundTrips =
    date.getUTCFullYear() === year &&
    date.getUTCMonth() === month - 1 &&
    date.getUTCDate() === day &&
    date.getUTCHours() === h &&
    date.getUTCMinutes() === m &&
    date.getUTCSeconds() === s;
  return roundTrips ? date : null;
}

/**
 * Parse a window boundary (UTC).
 *
 * - `YYYY-MM-DD HH:mm:ss` is taken exactly.
 * - `YYYY-MM-DD` and `DD/MM/YYYY` become 00:00:00, or 23:59:59 when `isEnd`.
 */
export function parseRateDate(raw: string, isEnd: boolean): Date {
  const value = raw.trim();
  const [h, m, s] = isEnd ? [23, 59, 59] : [0, 0, 0];
  let date: Date | null = null;

  const dateTime = DATE_TIME.exec(value);
  const isoDate = ISO_DATE.exec(value);
  const ukDate = UK_DATE.exec(value);

  if (dateTime) {
    const [, y, mo, d, hh, mi, ss] = dateTime.map(Number);
    date = utcDate(y, mo, d, hh, mi, ss);
  } else if (isoDate) {
    const [, y, mo, d] = isoDate.map(Number);
    date = utcDate(y, mo, d, h, m, s);
  } else if (ukDate) {
    const [, d, mo, y] = ukDate.map(Number);
    date = utcDate(y, mo, d, h, m, s);
  }

  if (!date) {
    throw new RateFileError(
      `Unrecognized date format: '${value}'. Expected 'YYYY-MM-DD', 'DD/MM/YYYY' or 'YYYY-MM-DD HH:mm:ss'.`,
      { value },
    );
  }
  return date;
}

function resolveColumns(headers: string[], needsDates: boolean): ColumnMap {
  const find = (...names: string[]) => headers.find((h) => names.some((n) => h.toLowerCase() === n.toLowerCase())) ?? null;

  const code = find('Currency Code');
  // The pound sign in "Currency units per £1" is often mangled by encodings
  const rate = headers.find((h) => h.toLowerCase().startsWith('currency units per')) ?? null;
  const from = find('Start date', 'Valid From');
  const to = find('End date', 'Valid To');

  if (!code || !rate || (needsDates && (!from || !to))) {
    throw new RateFileError('Required columns not found in CSV file', { headers });
  }

  return { code, name: find('Currency'), rate, from, to };
}

/**
 * Parse a published "currency units per £1" table into rate rows.
 *
 * Rows are grouped by currency and window; the first row of a group wins.
 * Throws on empty or non-ISO codes, unusable rates and unparseable dates.
 */
export function parseRateFile(content: string, options: ParseRateFileOptions = {}): RateFileRow[] {
  const metadata = options.currencyMetadata ?? defaultMetadata;
  const records = recordsSchema.parse(
    parse(content, { columns: true, skip_empty_lines: true, trim: true, bom: true }),
  );
  if (records.length === 0) return [];

  const columns = resolveColumns(Object.keys(records[0]), !options.validityOverride);
  const groups = new Map<string, RateFileRow>();

  records.forEach((record, index) => {
    const line = index + 2;
    const currencyCode = (record[columns.code] ?? '').toUpperCase();
    if (!currencyCode) {
      throw new RateFileError(`Row ${line}: currency code cannot be empty`, { line, record });
    }
    if (!metadata.exists(currencyCode)) {
      throw new CurrencyNotFoundError(currencyCode, 'invalid-code');
    }

    const rawRate = record[columns.rate] ?? '';
    const rate = parseDecimal(rawRate);
    if (!rate || rate.lte(0) || rate.gte(MAX_UNITS_PER_GBP)) {
      throw new RateFileError(`Row ${line}: invalid rate '${rawRate}' for ${currencyCode}`, { line, currencyCode });
    }

    const window = options.validityOverride ?? {
      validFrom: parseRateDate(columns.from ? (record[columns.from] ?? '') : '', false),
      validTo: parseRateDate(columns.to ? (record[columns.to] ?? '') : '', true),
    };
    if (window.validTo < window.validFrom) {
      throw new RateFileError(`Row ${line}: window for ${currencyCode} ends before it starts`, { line, currencyCode });
    }

    const key = `${currencyCode}_${window.validFrom.toISOString()}_${window.validTo.toISOString()}`;
    if (groups.has(key)) return;

    const name = (columns.name ? record[columns.name] : '') || metadata.name(currencyCode) || currencyCode;
    groups.set(key, {
      currencyCode,
      currencyName: name,
      unitsPerGbp: rate.toFixed(),
      validFrom: window.validFrom,
      validTo: window.validTo,
    });
  });

  return Array.from(groups.values());
}
