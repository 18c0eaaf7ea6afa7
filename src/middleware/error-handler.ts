import type { Request, Response, NextFunction } from 'express';
import pino from 'pino';
import { AppError, toErrorObject } from '../utils/errors.js';

const log = pino({ name: 'errors' });

export interface ErrorBody {
  status: 'error';
  code: number;
  message: string;
  errors?: Record<string, string>;
}

export function errorBody(code: number, message: string, errors?: Record<string, string>): ErrorBody {
  return errors ? { status: 'error', code, message, errors } : { status: 'error', code, message };
}

/** body-parser marks JSON syntax errors with this type. */
function isJsonParseError(err: unknown): boolean {
  return err instanceof SyntaxError && 'type' in err && err.type === 'entity.parse.failed';
}

const BODY_ERROR_MESSAGES: Record<string, string> = {
  'entity.too.large': 'Request body too large',
  'charset.unsupported': 'Unsupported request charset',
  'encoding.unsupported': 'Unsupported content encoding',
};

/** Client-side body-parser failure: its 4xx status and a message to answer with. */
function bodyParserFailure(err: unknown): { status: number; message: string } | null {
  if (!(err instanceof Error) || !('type' in err) || !('status' in err)) return null;
  const { type, status } = err;
  if (typeof type !== 'string' || typeof status !== 'number' || status < 400 || status >= 500) return null;
  return { status, message: BODY_ERROR_MESSAGES[type] ?? err.message };
}

export function notFound(_req: Request, res: Response) {
  return res.status(404).json(errorBody(404, 'Not found'));
}

/**
 * Last middleware in the chain. Body-parser 4xx failures and operational
 * AppErrors keep their status; anything else is logged and answered with a generic 500.
 */
export function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction) {
  if (isJsonParseError(err)) {
    return res.status(400).json(errorBody(400, 'Invalid JSON'));
  }

  const bodyFailure = bodyParserFailure(err);
  if (bodyFailure) {
    return res.status(bodyFailure.status).json(errorBody(bodyFailure.status, bodyFailure.message));
  }

  if (err instanceof AppError && err.isOperational) {
    log.warn({ ...res.locals.requestContext, ...toErrorObject(err) }, 'Request failed');
    return res.status(err.statusCode).json(errorBody(err.statusCode, err.message));
  }

  log.error({ ...res.locals.requestContext, err }, 'Unhandled error');
  return res.status(500).json(errorBody(500, 'An unexpected error occurred'));
}
