import { readFileSync } from 'node:fs';
import { z } from 'zod';

/**
 * ISO 4217 lookup: display name and minor-unit digits per currency code.
 * The table lives in data/currencies.json at the repository root.
 */
export interface CurrencyMetadata {
  exists(code: string): boolean;
  name(code: string): string | null;
  fractionDigits(code: string): number;
}

export const DEFAULT_FRACTION_DIGITS = 2;

const currencyTableSchema = z.record(
  z.string().regex(/^[A-Z]{3}$/),
  z.object({
    name: z.string().min(1),
    fractionDigits: z.number().int().min(0),
  }),
);

export type CurrencyTable = z.infer<typeof currencyTableSchema>;

const TABLE_URL = new URL('../../../data/currencies.json', import.meta.url);

export function loadCurrencyTable(url: URL = TABLE_URL): CurrencyTable {
  return currencyTableSchema.parse(JSON.parse(readFileSync(url, 'utf8')));
}

export function createCurrencyMetadata(table: CurrencyTable): CurrencyMetadata {
  const entries = new Map(Object.entries(table));
  return {
    exists: (code) => entries.has(code.trim().toUpperCase()),
    name: (code) => entries.get(code.trim().toUpperCase())?.name ?? null,
    fractionDigits: (code) =>
      entries.get(code.trim().toUpperCase())?.fractionDigits ?? DEFAULT_FRACTION_DIGITS,
  };
}

export const currencyMetadata: CurrencyMetadata = createCurrencyMetadata(loadCurrencyTable());
