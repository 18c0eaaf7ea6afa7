import pino from 'pino';
import { pool } from '../db/pool.js';
import { createApiKey, deactivateApiKey } from '../services/api-keys/api-key-repository.js';

const logger = pino({ name: 'api-keys' });

// npm run create-api-key -- <name>
// npm run create-api-key -- --deactivate=<key>
async function main(): Promise<void> {
  const deactivate = process.argv.find((arg) => arg.startsWith('--deactivate='))?.split('=')[1];
  const name = process.argv.slice(2).find((arg) => !arg.startsWith('--'));

  try {
    if (deactivate) {
      const changed = await deactivateApiKey(deactivate);
      if (!changed) {
        logger.warn('No API key matched');
        process.exitCode = 1;
        return;
      }
      logger.info('API key deactivated');
      return;
    }

    if (!name) {
      throw new Error('Usage: create-api-key <name> | --deactivate=<key>');
    }

    const { key, record } = await createApiKey(name);
    logger.info({ id: record.id, name: record.name }, 'API key created');
    // Printed once, never logged
    console.log(key);
  } catch (error) {
    logger.error({ err: error }, 'API key command failed');
    process.exitCode = 1;
  } finally {
    await pool.end();
  }
}

main().catch((err) => {
  logger.error({ err }, 'API key command crashed');
  process.exitCode = 1;
});
