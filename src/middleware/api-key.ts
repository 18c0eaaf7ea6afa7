import type { Request, Response, NextFunction } from 'express';
import pino from 'pino';
import { findActiveByKey, touchLastUsed } from '../services/api-keys/api-key-repository.js';
import { errorBody } from './error-handler.js';

const log = pino({ name: 'auth' });

export const API_KEY_HEADER = 'X-API-Key';

/**
 * requireApiKey middleware: protects everything mounted under /api.
 * Returns 401 when the header is missing or names no active key.
 */
export async function requireApiKey(req: Request, res: Response, next: NextFunction) {
  const apiKey = req.get(API_KEY_HEADER);

  if (!apiKey) {
    return res.status(401).json(errorBody(401, 'API key is required'));
  }

  try {
    const key = await findActiveByKey(apiKey);
    if (!key) {
      log.warn({ ...res.locals.requestContext }, 'Rejected request with invalid API key');
      return res.status(401).json(errorBody(401, 'Invalid API key'));
    }

    await touchLastUsed(key.id);
    res.locals.requestContext.apiKeyName = key.name;
    return next();
  } catch (err) {
    return next(err);
  }
}
