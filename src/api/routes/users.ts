/**
 * User Routes
 * The caller's own user record
 */

import { Hono } from 'hono';

import type { UserService } from '@/services/user.service.js';

import {
  errorResponse,
  getActor,
  getRequestId,
  serializeUser,
  successResponse,
} from '../utils/response.js';

interface UserRoutesDeps {
  userService: Pick<UserService, 'getUser'>;
}

/**
 * Create user routes
 */
export function createUserRoutes(deps: UserRoutesDeps): Hono {
  const { userService } = deps;
  const app = new Hono();

  /**
   * GET /users/me
   * Current user's record, including storage used
   */
  app.get('/users/me', async (c) => {
    const actor = getActor(c);
    const requestId = getRequestId(c);

    const result = await userService.getUser(actor.userId);
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    return successResponse(c, serializeUser(result.data), requestId);
  });

  return app;
}
