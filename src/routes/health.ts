import { Router } from 'express';
import pino from 'pino';
import { pool } from '../db/pool.js';

const log = pino({ name: 'health' });
const router = Router();

/**
 * GET /healthz: liveness plus a round-trip to Postgres. No API key needed.
 */
router.get('/healthz', async (_req, res) => {
  try {
    await pool.query('SELECT 1');
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  } catch (err) {
    log.error({ err }, 'Database health check failed');
    res.status(503).json({ status: 'error' });
  }
});

export default router;
