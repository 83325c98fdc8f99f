/**
 * Admin Routes
 * Moderation endpoints. Mounted behind the admin middleware.
 */

import type { Context } from 'hono';
import { Hono } from 'hono';

import type { UserService } from '@/services/user.service.js';

import {
  errorResponse,
  getActor,
  getRequestId,
  serializeUser,
  successResponse,
} from '../utils/response.js';

interface AdminRoutesDeps {
  userService: Pick<UserService, 'setBanned'>;
}

/**
 * Create admin routes
 */
export function createAdminRoutes(deps: AdminRoutesDeps): Hono {
  const { userService } = deps;
  const app = new Hono();

  async function setBanned(c: Context, banned: boolean): Promise<Response> {
    const actor = getActor(c);
    const requestId = getRequestId(c);

    const result = await userService.setBanned(
      actor.userId,
      c.req.param('id') ?? '',
      banned
    );
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    return successResponse(c, serializeUser(result.data), requestId);
  }

  /**
   * POST /admin/users/:id/ban
   */
  app.post('/admin/users/:id/ban', (c) => setBanned(c, true));

  /**
   * DELETE /admin/users/:id/ban
   */
  app.delete('/admin/users/:id/ban', (c) => setBanned(c, false));

  return app;
}
