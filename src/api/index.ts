/**
 * API Layer Exports
 *
 * API layer is thin - delegates to services for all business logic.
 */

export { createApp } from './app.js';
export type { ApiServices, ApiErrorCode } from './types.js';
export { ERROR_STATUS_MAP, getErrorStatus } from './types.js';
export type { InMemoryRateLimiter, RateLimiter } from './middleware/rateLimit.js';
export {
  DAY_SECONDS,
  createInMemoryRateLimiter,
  createRateLimiter,
  createUpstashRateLimiter,
} from './middleware/rateLimit.js';
