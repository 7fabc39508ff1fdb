import type { MiddlewareHandler } from 'hono';
import type { GuiEnv } from '../env.js';

/**
 * One JSON line per request, written after the response is ready.
 */
export function requestLogger(log: (line: string) => void): MiddlewareHandler<GuiEnv> {
  return async (c, next) => {
    const started = Date.now();
    await next();
    log(
      JSON.stringify({
        method: c.req.method,
        path: c.req.path,
        status: c.res.status,
        duration_ms: Date.now() - started,
      }),
    );
  };
}
