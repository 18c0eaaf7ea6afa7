import { runner } from 'node-pg-migrate';
import path from 'node:path';
import pino from 'pino';
import { config } from '../config/index.js';

const logger = pino({ name: 'migrate' });

export type MigrationDirection = 'up' | 'down';

/**
 * Apply the SQL migrations under ./migrations.
 * `down` reverts only the most recent one.
 */
export async function runMigrations(direction: MigrationDirection = 'up'): Promise<string[]> {
  logger.info({ direction }, 'Running database migrations...');

  const applied = await runner({
    databaseUrl: config.DATABASE_URL,
    dir: path.resolve('migrations'),
    direction,
    count: direction === 'down' ? 1 : Infinity,
    migrationsTable: 'pgmigrations',
    log: (msg: string) => logger.debug(msg),
  });

  const names = applied.map((m) => m.name);
  logger.info({ direction, migrations: names }, 'Migrations completed successfully');
  return names;
}

// npm run migrate [-- down]
if (process.argv[1]?.endsWith('migrate.ts')) {
  const direction: MigrationDirection = process.argv.includes('down') ? 'down' : 'up';
  runMigrations(direction)
    .then(() => process.exit(0))
    .catch((err) => {
      logger.error({ err }, 'Migration failed');
      process.exit(1);
    });
}
