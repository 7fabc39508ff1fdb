/**
 * Per-IP sliding-window rate limiting.
 */

import type { MiddlewareHandler } from 'hono';
import type { GuiEnv } from '../env.js';
import type { GuiSession } from '../session.js';

interface Window {
  windowMs: number;
  times: number[];
}

export class SlidingWindowLimiter {
  private readonly windows = new Map<string, Window>();

  constructor(private readonly now: () => number = Date.now) {}

  /** Number of keys with hits still inside their window. */
  get size(): number {
    return this.windows.size;
  }

  /**
   * Count a request against `key`. Returns 0 when it is allowed, otherwise
   * the number of seconds until the oldest hit leaves the window.
   */
  hit(key: string, max: number, windowMs: number): number {
    const now = this.now();
    this.sweep(now);
    const recent = (this.windows.get(key)?.times ?? []).filter((t) => now - t < windowMs);

    if (recent.length >= max) {
      this.windows.set(key, { windowMs, times: recent });
      const oldest = recent[0] ?? now;
      return Math.max(1, Math.ceil((oldest + windowMs - now) / 1000));
    }

    recent.push(now);
    this.windows.set(key, { windowMs, times: recent });
    return 0;
  }

  private sweep(now: number): void {
    for (const [key, { windowMs, times }] of this.windows) {
      const newest = times[times.length - 1];
      if (newest === undefined || now - newest >= windowMs) this.windows.delete(key);
    }
  }
}

export interface RateLimitOptions {
  /** Name used for the window key and the audit entry. */
  endpoint: string;
  max: number;
  windowMs?: number;
}

export function rateLimit(
  session: GuiSession,
  limiter: SlidingWindowLimiter,
  options: RateLimitOptions,
): MiddlewareHandler<GuiEnv> {
  const windowMs = options.windowMs ?? 60_000;

  return async (c, next) => {
    const ip = c.get('clientIp');
    const retryAfter = limiter.hit(`${options.endpoint}|${ip}`, options.max, windowMs);
    if (retryAfter > 0) {
      session.audit.rateLimitHit(ip, options.endpoint);
      c.header('Retry-After', String(retryAfter));
      return c.json({ error: 'too many requests', retry_after: retryAfter }, 429);
    }
    await next();
  };
}
