/**
 * Main Hono Application
 * Wires together all routes and middleware
 */

import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { logger as requestLogger } from 'hono/logger';

import type { BotHandler } from '@/bot/handler.js';
import type { Logger } from '@/lib/logger.js';

import { createAdminMiddleware } from './middleware/admin.js';
import {
  createAuthMiddleware,
  createPublicMiddleware,
} from './middleware/auth.js';
import type { RateLimiter } from './middleware/rateLimit.js';
import { createRateLimitMiddleware } from './middleware/rateLimit.js';
import { createAdminRoutes } from './routes/admin.js';
import { createFileRoutes } from './routes/files.js';
import { createHealthRoutes } from './routes/health.js';
import { createTelegramRoutes } from './routes/telegram.js';
import { createUserRoutes } from './routes/users.js';
import type { ApiServices } from './types.js';

/**
 * App configuration
 */
interface AppOptions {
  services: ApiServices;
  bot: BotHandler;
  logger: Logger;
  apiToken: string;
  adminUserId: string | null;
  webhookSecret: string;
  maxFileSizeBytes: number;
  shareUrl: (fileId: string) => string;
  rateLimiters: {
    uploads: RateLimiter;
    downloads: RateLimiter;
  };
  allowedOrigins?: string[];
}

/**
 * Create the main Hono application
 */
export function createApp(options: AppOptions): Hono {
  const { services, logger, allowedOrigins } = options;
  const app = new Hono();

  // Global middleware
  app.use(
    '*',
    requestLogger((message, ...rest) => logger.info(message, ...rest))
  );
  app.use(
    '*',
    cors({
      origin: allowedOrigins ?? ['http://localhost:3000'],
      credentials: true,
    })
  );

  // Public routes (no auth)
  const publicMiddleware = createPublicMiddleware();
  app.use('/api/v1/health', publicMiddleware);
  app.route('/api/v1', createHealthRoutes());

  // Telegram webhook (checked by its own secret header)
  app.use('/telegram/*', publicMiddleware);
  app.route(
    '/',
    createTelegramRoutes({
      bot: options.bot,
      webhookSecret: options.webhookSecret,
      logger: logger.child('telegram'),
    })
  );

  // Auth middleware for protected routes
  const authMiddleware = createAuthMiddleware({
    apiToken: options.apiToken,
    userService: services.userService,
    adminUserId: options.adminUserId,
    logger: logger.child('auth'),
  });

  // File routes
  app.use('/api/v1/files/*', authMiddleware);
  app.use('/api/v1/files', authMiddleware);
  app.route(
    '/api/v1',
    createFileRoutes({
      custodyService: services.custodyService,
      userService: services.userService,
      logger: logger.child('files'),
      maxFileSizeBytes: options.maxFileSizeBytes,
      shareUrl: options.shareUrl,
      uploadLimit: createRateLimitMiddleware(options.rateLimiters.uploads),
      downloadLimit: createRateLimitMiddleware(options.rateLimiters.downloads),
    })
  );

  // User routes
  app.use('/api/v1/users/*', authMiddleware);
  app.route(
    '/api/v1',
    createUserRoutes({ userService: services.userService })
  );

  // Admin routes (require auth + admin)
  const adminMiddleware = createAdminMiddleware();
  app.use('/api/v1/admin/*', authMiddleware);
  app.use('/api/v1/admin/*', adminMiddleware);
  app.route(
    '/api/v1',
    createAdminRoutes({ userService: services.userService })
  );

  // 404 handler
  app.notFound((c) => {
    return c.json(
      {
        error: {
          code: 'NOT_FOUND',
          message: 'Endpoint not found',
          requestId: c.get('requestId') ?? 'unknown',
        },
      },
      404
    );
  });

  // Global error handler
  app.onError((err, c) => {
    logger.error('Unhandled error:', err);

    return c.json(
      {
        error: {
          code: 'INTERNAL_ERROR',
          message: 'An unexpected error occurred',
          requestId: c.get('requestId') ?? 'unknown',
        },
      },
      500
    );
  });

  return app;
}
