import { randomUUID } from 'node:crypto';
import type { Context, Next } from 'hono';
import logger, { type Logger } from '../lib/logger.js';

declare module 'hono' {
  interface ContextVariableMap {
    requestId: string;
    log: Logger;
  }
}

const REQUEST_ID_PATTERN = /^[A-Za-z0-9._:-]+$/;

/** Accepts a well-formed inbound X-Request-ID, otherwise mints one. */
export function resolveRequestId(raw: string | undefined): string {
  const candidate = raw?.trim().slice(0, 64);
  return candidate && REQUEST_ID_PATTERN.test(candidate) ? candidate : randomUUID();
}

export async function requestIdMiddleware(c: Context, next: Next) {
  const requestId = resolveRequestId(c.req.header('X-Request-ID'));
  c.set('requestId', requestId);
  c.set('log', logger.child({ request_id: requestId }));
  c.header('X-Request-ID', requestId);
  await next();
}
