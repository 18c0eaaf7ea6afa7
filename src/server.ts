import pino from 'pino';
import { config } from './config/index.js';
import { pool } from './db/pool.js';
import { runMigrations } from './db/migrate.js';
import app from './app.js';

const logger = pino({ name: 'server' });

// Catch crashes before pino can flush
process.on('uncaughtException', (err) => {
  console.error(`UNCAUGHT EXCEPTION: ${err.message}`);
  console.error(err.stack);
  process.exit(1);
});
process.on('unhandledRejection', (reason) => {
  console.error(`UNHANDLED REJECTION: ${reason}`);
  process.exit(1);
});

async function boot(): Promise<void> {
  // Step 1: Config already validated by Zod at import time
  logger.info({ env: config.NODE_ENV }, 'Configuration validated');

  // Step 2: Test database connection
  logger.info('Connecting to database...');
  await pool.query('SELECT 1');
  logger.info('Database connected');

  // Step 3: Run migrations
  await runMigrations();

  // Step 4: Start Express
  const server = app.listen(config.PORT, () => {
    logger.info(`Server ready on port ${config.PORT}`);
  });

  const shutdown = (signal: string) => {
    logger.info({ signal }, 'Shutting down');
    server.close(() => {
      pool
        .end()
        .then(() => process.exit(0))
        .catch((err) => {
          logger.error({ err }, 'Failed to close database pool');
          process.exit(1);
        });
    });
  };
  process.once('SIGTERM', () => shutdown('SIGTERM'));
  process.once('SIGINT', () => shutdown('SIGINT'));
}

boot().catch((err) => {
  const message = err instanceof Error ? err.message : String(err);
  const stack = err instanceof Error ? err.stack : '';
  console.error(`BOOT FAILED: ${message}`);
  console.error(`Stack: ${stack}`);
  process.exit(1);
});
