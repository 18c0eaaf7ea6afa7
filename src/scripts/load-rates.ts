import { readFile } from 'node:fs/promises';
import pino from 'pino';
import { config } from '../config/index.js';
import { pool } from '../db/pool.js';
import { parseRateDate, parseRateFile, type RateWindow } from '../services/rates/rate-file.js';
import { loadRates } from '../services/rates/rate-loader.js';
import { toErrorObject } from '../utils/errors.js';

const logger = pino({ name: 'load-rates' });

function flag(name: string): string | undefined {
  const prefix = `--${name}=`;
  return process.argv.find((arg) => arg.startsWith(prefix))?.slice(prefix.length);
}

function validityOverride(): RateWindow | undefined {
  const from = flag('valid-from');
  const to = flag('valid-to');
  if (!from && !to) return undefined;
  if (!from || !to) {
    throw new Error('--valid-from and --valid-to must be given together');
  }
  return { validFrom: parseRateDate(from, false), validTo: parseRateDate(to, true) };
}

// npm run load-rates -- [path] [--valid-from=YYYY-MM-DD --valid-to=YYYY-MM-DD]
async function main(): Promise<void> {
  const path = process.argv.slice(2).find((arg) => !arg.startsWith('--')) ?? config.FOREX_DATA_PATH;

  try {
    if (!path) {
      throw new Error('No rate file given and FOREX_DATA_PATH is not set');
    }

    const rows = parseRateFile(await readFile(path, 'utf8'), { validityOverride: validityOverride() });
    logger.info({ path, rows: rows.length }, 'Parsed rate file');

    const summary = await loadRates(rows);
    logger.info(summary, 'Load completed successfully');
  } catch (error) {
    logger.error({ path, ...toErrorObject(error) }, 'Load failed');
    process.exitCode = 1;
  } finally {
    await pool.end();
  }
}

main().catch((err) => {
  logger.error({ err }, 'Load crashed');
  process.exitCode = 1;
});
