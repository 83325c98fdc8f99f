/**
 * Admin Middleware
 * Guards admin routes. Runs after the auth middleware.
 */

import type { Context, Next } from 'hono';

import { errorResponse } from '../utils/response.js';

/**
 * Admin middleware - verifies actor is an admin
 */
export function createAdminMiddleware() {
  return async function adminMiddleware(
    c: Context,
    next: Next
  ): Promise<Response | void> {
    const actor = c.get('actor');
    const requestId = c.get('requestId') ?? 'unknown';

    if (actor === undefined) {
      return errorResponse(
        c,
        { code: 'UNAUTHORIZED', message: 'Authentication required' },
        requestId
      );
    }

    if (actor.type !== 'admin') {
      return errorResponse(
        c,
        { code: 'FORBIDDEN', message: 'Admin access required' },
        actor.requestId
      );
    }

    await next();
  };
}
