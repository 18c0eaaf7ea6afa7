import { randomUUID } from 'crypto';

/**
 * Generate a short correlation ID for tracing one request through the logs.
 * Uses first 8 chars of a UUID for brevity.
 */
export function generateCorrelationId(): string {
  return randomUUID().slice(0, 8);
}

/**
 * Per-request context kept on `res.locals` and spread into log calls.
 */
export interface RequestContext {
  correlationId: string;
  method: string;
  path: string;
  apiKeyName?: string;
}

const REQUEST_ID_PATTERN = /^[A-Za-z0-9-]{1,64}$/;

/**
 * Reuse a caller-supplied X-Request-Id when it looks sane, otherwise mint one.
 */
export function createRequestContext(method: string, path: string, incomingId?: string): RequestContext {
  return {
    correlationId: incomingId && REQUEST_ID_PATTERN.test(incomingId) ? incomingId : generateCorrelationId(),
    method,
    path,
  };
}
