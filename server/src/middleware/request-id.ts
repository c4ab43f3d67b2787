import { randomUUID } from 'node:crypto';
import type { Context, Next } from 'hono';
import { createRequestLogger, type Logger } from '../lib/logger.js';

declare module 'hono' {
  interface ContextVariableMap {
    requestId: string;
    logger: Logger;
  }
}

const REQUEST_ID_PATTERN = /^[A-Za-z0-9._:-]+$/;

/**
 * Accepts a caller-supplied X-Request-ID when it is short and safe to log,
 * otherwise mints one. Also stores a request-scoped child logger.
 */
export async function requestIdMiddleware(c: Context, next: Next) {
  const raw = c.req.header('X-Request-ID');
  let requestId: string = randomUUID();
  if (raw) {
    const candidate = raw.trim().slice(0, 64);
    if (REQUEST_ID_PATTERN.test(candidate)) {
      requestId = candidate;
    }
  }
  c.set('requestId', requestId);
  c.set('logger', createRequestLogger(requestId));
  c.header('X-Request-ID', requestId);
  await next();
}
