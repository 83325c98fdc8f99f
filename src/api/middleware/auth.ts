/**
 * Auth Middleware
 * Constructs ActorContext for calls made by a trusted front-end.
 *
 * The front-end authenticates with the shared API token and names the end
 * user it acts for in the X-Actor-* headers.
 */

import { timingSafeEqual } from 'node:crypto';

import type { Context, Next } from 'hono';
import { nanoid } from 'nanoid';

import type { Logger } from '@/lib/logger.js';
import type { UserService } from '@/services/user.service.js';
import type { ActorContext } from '@/types/index.js';

import { errorResponse } from '../utils/response.js';

/**
 * Auth middleware dependencies
 */
interface AuthMiddlewareDeps {
  apiToken: string;
  userService: Pick<UserService, 'getOrCreateUser'>;
  adminUserId: string | null;
  logger: Logger;
}

/**
 * Generate a unique request ID
 */
export function generateRequestId(): string {
  return nanoid();
}

function tokensMatch(given: string, expected: string): boolean {
  const a = Buffer.from(given);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}

function optionalHeader(c: Context, name: string): string | null {
  const value = c.req.header(name)?.trim();
  return value !== undefined && value !== '' ? value : null;
}

/**
 * Create auth middleware for protected routes
 */
export function createAuthMiddleware(deps: AuthMiddlewareDeps) {
  const { apiToken, userService, adminUserId, logger } = deps;

  return async function authMiddleware(c: Context, next: Next) {
    const requestId = generateRequestId();

    // 1. Service token
    const authHeader = c.req.header('Authorization');
    if (!authHeader || !authHeader.startsWith('Bearer ')) {
      return errorResponse(
        c,
        { code: 'UNAUTHORIZED', message: 'Missing or invalid authorization header' },
        requestId
      );
    }

    const token = authHeader.slice(7).trim();
    if (!tokensMatch(token, apiToken)) {
      return errorResponse(
        c,
        { code: 'UNAUTHORIZED', message: 'Invalid API token' },
        requestId
      );
    }

    // 2. End user the front-end acts for
    const actorId = optionalHeader(c, 'X-Actor-Id');
    if (actorId === null) {
      return errorResponse(
        c,
        { code: 'UNAUTHORIZED', message: 'X-Actor-Id header is required' },
        requestId
      );
    }

    const username = optionalHeader(c, 'X-Actor-Username');
    const displayName = optionalHeader(c, 'X-Actor-Name');

    // 3. Lazily create the user record
    const userResult = await userService.getOrCreateUser(
      actorId,
      username,
      displayName
    );
    if (!userResult.success) {
      logger.error(`Failed to load user ${actorId}`, userResult.error);
      return errorResponse(c, userResult.error, requestId);
    }

    const user = userResult.data;
    if (user.isBanned) {
      return errorResponse(
        c,
        { code: 'FORBIDDEN', message: 'User is banned' },
        requestId
      );
    }

    // 4. Construct ActorContext
    const actor: ActorContext = {
      type: user.isAdmin || user.id === adminUserId ? 'admin' : 'user',
      userId: user.id,
      displayName: user.displayName ?? displayName ?? user.username,
      requestId,
    };

    c.set('actor', actor);
    c.set('requestId', requestId);

    return next();
  };
}

/**
 * Create public middleware for routes that don't require auth.
 * Only assigns a request ID.
 */
export function createPublicMiddleware() {
  return function publicMiddleware(c: Context, next: Next) {
    c.set('requestId', generateRequestId());
    return next();
  };
}
