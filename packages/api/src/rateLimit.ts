import type { Context, Env } from 'hono';
import { createMiddleware } from 'hono/factory';

import type { RateLimitBudget } from './config.js';

type Bucket = { count: number; resetAtMs: number };

export type RateLimitOptions<E extends Env = Env> = RateLimitBudget & {
  key: (c: Context<E>) => string;
};

export function createRateLimiter(now: () => number = Date.now) {
  function gc(buckets: Map<string, Bucket>, at: number): void {
    for (const [k, v] of buckets.entries()) {
      if (v.resetAtMs <= at) buckets.delete(k);
    }
  }

  // Each middleware keeps its own buckets, so routes never share a budget.
  return function rateLimit<E extends Env = Env>(opts: RateLimitOptions<E>) {
    const buckets = new Map<string, Bucket>();
    return createMiddleware<E>(async (c, next) => {
      const at = now();
      gc(buckets, at);
      const k = opts.key(c);
      const b = buckets.get(k);
      if (!b || b.resetAtMs <= at) {
        buckets.set(k, { count: 1, resetAtMs: at + opts.windowSeconds * 1000 });
        await next();
        return;
      }
      if (b.count >= opts.points) {
        const retryAfterSeconds = Math.max(1, Math.ceil((b.resetAtMs - at) / 1000));
        c.header('retry-after', String(retryAfterSeconds));
        return c.json({ error: { code: 'RATE_LIMIT', message: 'Demasiados pedidos. Tente novamente dentro de momentos.' } }, 429);
      }
      b.count += 1;
      await next();
    });
  };
}

// Only the client address: request headers such as Authorization are unverified here.
export function clientIpKey(c: Context): string {
  const forwarded = c.req.header('x-forwarded-for')?.split(',')[0]?.trim();
  return `ip:${forwarded || c.req.header('x-real-ip') || 'unknown'}`;
}
