/**
 * Rate Limiting Middleware
 * Uses Upstash Redis for distributed rate limiting, or an in-process
 * fixed window when Redis is not configured.
 */

import { Ratelimit } from '@upstash/ratelimit';
import type { Redis } from '@upstash/redis';
import type { Context, Next } from 'hono';

import { errorResponse } from '../utils/response.js';

/**
 * Rate limit configuration
 */
export interface RateLimitConfig {
  /**
   * Maximum requests allowed in the window
   */
  limit: number;

  /**
   * Window duration in seconds
   */
  window: number;

  /**
   * Key namespace, one per limited action
   */
  prefix: string;

  /**
   * Optional: Get identifier from context (defaults to actor, then IP)
   */
  getIdentifier?: (c: Context) => string;
}

/**
 * Rate limit result. `reset` is the epoch millisecond the window ends.
 */
export interface RateLimitResult {
  success: boolean;
  limit: number;
  remaining: number;
  reset: number;
}

/**
 * Rate limiter interface (injectable for testing)
 */
export interface RateLimiter {
  limit: (identifier: string) => Promise<RateLimitResult>;
}

export const DAY_SECONDS = 24 * 60 * 60;

/**
 * Get identifier from context
 * Priority: userId > IP > 'anonymous'
 */
function defaultGetIdentifier(c: Context): string {
  const actor = c.get('actor');
  if (actor?.userId) {
    return `user:${actor.userId}`;
  }
  const ip =
    c.req.header('x-forwarded-for') || c.req.header('x-real-ip') || 'anonymous';
  return `ip:${ip}`;
}

/**
 * Create rate limit middleware
 *
 * @param rateLimiter - Upstash-backed or in-memory limiter
 */
export function createRateLimitMiddleware(
  rateLimiter: RateLimiter,
  config: Pick<RateLimitConfig, 'getIdentifier'> = {},
  now: () => number = Date.now
) {
  const getIdentifier = config.getIdentifier ?? defaultGetIdentifier;

  return async function rateLimitMiddleware(c: Context, next: Next) {
    const result = await rateLimiter.limit(getIdentifier(c));
    const retryAfter = Math.max(0, Math.ceil((result.reset - now()) / 1000));

    // Set rate limit headers
    c.header('X-RateLimit-Limit', result.limit.toString());
    c.header('X-RateLimit-Remaining', result.remaining.toString());
    c.header('X-RateLimit-Reset', result.reset.toString());

    if (!result.success) {
      c.header('Retry-After', retryAfter.toString());
      return errorResponse(
        c,
        {
          code: 'RATE_LIMITED',
          message: 'Too many requests',
          details: { retryAfter, limit: result.limit },
        },
        c.get('requestId') ?? 'unknown'
      );
    }

    return next();
  };
}

/**
 * Create Upstash rate limiter (sliding window)
 */
export function createUpstashRateLimiter(
  redis: Redis,
  config: Pick<RateLimitConfig, 'limit' | 'window' | 'prefix'>
): RateLimiter {
  const ratelimit = new Ratelimit({
    redis,
    limiter: Ratelimit.slidingWindow(config.limit, `${config.window} s`),
    prefix: `custody:${config.prefix}`,
  });

  return {
    async limit(identifier: string): Promise<RateLimitResult> {
      const result = await ratelimit.limit(identifier);
      return {
        success: result.success,
        limit: result.limit,
        remaining: result.remaining,
        reset: result.reset,
      };
    },
  };
}

export interface InMemoryRateLimiter extends RateLimiter {
  /** Identifiers currently tracked */
  size(): number;
}

/**
 * Create in-memory rate limiter (single process, fixed window)
 */
export function createInMemoryRateLimiter(
  config: Pick<RateLimitConfig, 'limit' | 'window'>,
  now: () => number = Date.now
): InMemoryRateLimiter {
  const store = new Map<string, { count: number; resetAt: number }>();
  const windowMs = config.window * 1000;
  let nextSweepAt = 0;

  // Drop expired windows of identifiers that never came back
  function sweep(current: number): void {
    if (current < nextSweepAt) {
      return;
    }
    for (const [identifier, entry] of store) {
      if (entry.resetAt <= current) {
        store.delete(identifier);
      }
    }
    nextSweepAt = current + windowMs;
  }

  return {
    size(): number {
      return store.size;
    },

    async limit(identifier: string): Promise<RateLimitResult> {
      const current = now();
      sweep(current);

      let entry = store.get(identifier);

      // Check if window has expired
      if (entry && entry.resetAt <= current) {
        entry = undefined;
        store.delete(identifier);
      }

      if (!entry) {
        entry = { count: 0, resetAt: current + windowMs };
        store.set(identifier, entry);
      }

      entry.count++;

      return {
        success: entry.count <= config.limit,
        limit: config.limit,
        remaining: Math.max(0, config.limit - entry.count),
        reset: entry.resetAt,
      };
    },
  };
}

/**
 * Pick the limiter for an action: Upstash when Redis is configured
 */
export function createRateLimiter(
  redis: Redis | null,
  config: Pick<RateLimitConfig, 'limit' | 'window' | 'prefix'>
): RateLimiter {
  return redis !== null
    ? createUpstashRateLimiter(redis, config)
    : createInMemoryRateLimiter(config);
}
