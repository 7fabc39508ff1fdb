import type { MiddlewareHandler } from 'hono';
import type { GuiEnv } from '../env.js';

/**
 * Record the caller's address and user agent for audit entries.
 */
export const clientInfo: MiddlewareHandler<GuiEnv> = async (c, next) => {
  c.set('clientIp', c.env?.incoming?.socket.remoteAddress ?? '127.0.0.1');
  c.set('userAgent', c.req.header('user-agent'));
  await next();
};
