import { describe, it, expect, vi, beforeEach } from 'vitest';

// ── Mock I/O boundaries (pool, pino) ────────────────────────────────────

const { poolQuery, logWarn } = vi.hoisted(() => ({
  poolQuery: vi.fn(),
  logWarn: vi.fn(),
}));

vi.mock('../../db/pool.js', () => ({
  pool: { query: poolQuery },
}));

vi.mock('pino', () => ({
  default: () => ({
    info: vi.fn(),
    warn: logWarn,
    error: vi.fn(),
    debug: vi.fn(),
  }),
}));

import { findCurrentRate, pgRateStore } from '../../services/exchange-rate/rate-repository.js';

// ── Test fixtures ────────────────────────────────────────────────────────

const AT = new Date('2025-06-15T12:00:00.000Z');

/** Stand-in for the pool or a transaction client, answering every query with `rows`. */
function fakeDb(rows: Array<{ id: number; units_per_gbp: string | null }>) {
  const query = vi.fn();
  query.mockResolvedValue({ rows, rowCount: rows.length });
  return { query };
}

describe('findCurrentRate', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('reports an unknown currency when no currency row exists', async () => {
    const db = fakeDb([]);

    const lookup = await findCurrentRate('CHF', AT, db);

    expect(lookup).toEqual({ found: false, reason: 'unknown-currency' });
    expect(db.query).toHaveBeenCalledWith(expect.stringContaining('WHERE c.code = $1'), ['CHF', AT]);
  });

  it('reports a missing current rate when the currency has no window covering the instant', async () => {
    const lookup = await findCurrentRate('CHF', AT, fakeDb([{ id: 3, units_per_gbp: null }]));

    expect(lookup).toEqual({ found: false, reason: 'no-current-rate' });
    expect(logWarn).not.toHaveBeenCalled();
  });

  it('builds the rate from the numeric string without going through a float', async () => {
    const lookup = await findCurrentRate('USD', AT, fakeDb([{ id: 1, units_per_gbp: '1.23456789' }]));

    expect(lookup.found).toBe(true);
    if (lookup.found) {
      expect(lookup.unitsPerBase.toString()).toBe('1.23456789');
    }
  });

  it('treats a zero stored rate as missing and warns', async () => {
    const lookup = await findCurrentRate('USD', AT, fakeDb([{ id: 1, units_per_gbp: '0.00000000' }]));

    expect(lookup).toEqual({ found: false, reason: 'no-current-rate' });
    expect(logWarn).toHaveBeenCalledWith(
      { code: 'USD', raw: '0.00000000' },
      'Stored rate is not a positive decimal, treating as missing',
    );
  });

  it('treats a non-numeric stored rate as missing', async () => {
    const lookup = await findCurrentRate('USD', AT, fakeDb([{ id: 1, units_per_gbp: 'n/a' }]));

    expect(lookup).toEqual({ found: false, reason: 'no-current-rate' });
    expect(logWarn).toHaveBeenCalledTimes(1);
  });
});

describe('pgRateStore', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    poolQuery.mockResolvedValue({ rows: [{ id: 2, units_per_gbp: '1.15000000' }], rowCount: 1 });
  });

  it('queries the shared pool at the given instant', async () => {
    const lookup = await pgRateStore.currentRatePerBase('EUR', AT);

    expect(poolQuery).toHaveBeenCalledWith(expect.any(String), ['EUR', AT]);
    expect(lookup.found && lookup.unitsPerBase.toString()).toBe('1.15');
  });

  it('defaults to the current time', async () => {
    vi.useFakeTimers();
    vi.setSystemTime(AT);
    try {
      await pgRateStore.currentRatePerBase('EUR');
    } finally {
      vi.useRealTimers();
    }

    expect(poolQuery).toHaveBeenCalledWith(expect.any(String), ['EUR', AT]);
  });
});
