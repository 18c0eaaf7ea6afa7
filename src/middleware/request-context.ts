import type { Request, Response, NextFunction } from 'express';
import pino from 'pino';
import { createRequestContext, type RequestContext } from '../services/logger/correlation.js';

declare global {
  namespace Express {
    interface Locals {
      requestContext: RequestContext;
    }
  }
}

const logger = pino({ name: 'http' });

/**
 * Attach a correlation ID to every request, echo it back as X-Request-Id
 * and log one line when the response has been sent.
 */
export function requestContext(req: Request, res: Response, next: NextFunction) {
  const context = createRequestContext(req.method, req.path, req.get('x-request-id'));
  res.locals.requestContext = context;
  res.setHeader('X-Request-Id', context.correlationId);

  const startedAt = Date.now();
  res.on('finish', () => {
    logger.info(
      { ...res.locals.requestContext, status: res.statusCode, durationMs: Date.now() - startedAt },
      'request',
    );
  });

  next();
}
