import { randomUUID } from 'node:crypto';
import type { Context, Next } from 'hono';

declare module 'hono' {
  interface ContextVariableMap {
    runId: string;
  }
}

const RUN_ID_RE = /^[A-Za-z0-9._:-]+$/;

/**
 * Tag each request with a scoring run id. A well-formed caller-supplied
 * X-Run-ID is reused (capped at 64 chars) so logs can be correlated upstream.
 */
export async function runIdMiddleware(c: Context, next: Next) {
  const candidate = c.req.header('X-Run-ID')?.trim().slice(0, 64);
  const runId = candidate && RUN_ID_RE.test(candidate) ? candidate : randomUUID();
  c.set('runId', runId);
  c.header('X-Run-ID', runId);
  await next();
}
