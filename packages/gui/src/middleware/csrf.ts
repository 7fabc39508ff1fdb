/**
 * CSRF protection for state-changing requests.
 *
 * The token comes from the X-CSRF-Token header or `csrf_token` in a JSON
 * body and is compared in constant time.
 */

import { timingSafeEqual } from 'node:crypto';
import type { Context, MiddlewareHandler } from 'hono';
import { z } from 'zod';
import type { GuiEnv } from '../env.js';
import type { GuiSession } from '../session.js';

const SAFE_METHODS = new Set(['GET', 'HEAD', 'OPTIONS']);

const tokenBodySchema = z.object({ csrf_token: z.string() });

export function tokensMatch(expected: string, presented: string): boolean {
  const a = Buffer.from(expected, 'utf-8');
  const b = Buffer.from(presented, 'utf-8');
  return a.length === b.length && timingSafeEqual(a, b);
}

async function presentedToken(c: Context<GuiEnv>): Promise<string | undefined> {
  const header = c.req.header('x-csrf-token');
  if (header) return header;

  if (!c.req.header('content-type')?.includes('application/json')) return undefined;
  let body: unknown;
  try {
    body = await c.req.json();
  } catch {
    // Malformed bodies are reported by the route that reads them.
    return undefined;
  }
  const parsed = tokenBodySchema.safeParse(body);
  return parsed.success ? parsed.data.csrf_token : undefined;
}

export function csrfProtection(session: GuiSession): MiddlewareHandler<GuiEnv> {
  return async (c, next) => {
    if (SAFE_METHODS.has(c.req.method)) return next();

    const token = await presentedToken(c);
    if (!token || !tokensMatch(session.csrfToken, token)) {
      session.audit.csrfFailure(c.get('clientIp'), c.req.path);
      return c.json({ error: 'invalid or missing CSRF token' }, 403);
    }
    await next();
  };
}
