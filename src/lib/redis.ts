/**
 * Upstash Redis Client Configuration
 * Backs the distributed rate limiter when Upstash credentials are present
 */

import { Redis } from '@upstash/redis';

import type { AppConfig } from './config.js';

/**
 * Create a Redis client, or null when Upstash is not configured
 */
export function createRedis(
  config: AppConfig['rateLimit']['redis']
): Redis | null {
  if (config === null) {
    return null;
  }
  return new Redis({
    url: config.url,
    token: config.token,
  });
}
