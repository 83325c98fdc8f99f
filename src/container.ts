/**
 * Application wiring
 * Builds every adapter and service from an AppConfig.
 */

import type { Hono } from 'hono';

import { DAY_SECONDS, createApp, createRateLimiter } from './api/index.js';
import { createBotApi } from './bot/bot.api.js';
import { createBotHandler } from './bot/handler.js';
import type { AppConfig, Logger } from './lib/index.js';
import { createLogger, createRedis, createSupabaseAdmin } from './lib/index.js';
import {
  createCustodyService,
  createCustodyServiceDb,
  createTelegramClient,
  createTelegramTransport,
  createUserService,
  createUserServiceDb,
} from './services/index.js';

export interface Application {
  app: Hono;
  logger: Logger;
}

/**
 * Wire the application. Nothing here opens a connection; clients connect
 * lazily on first use.
 */
export function buildApplication(
  config: AppConfig,
  fetchFn: typeof fetch = fetch
): Application {
  const logger = createLogger('custody', config.logLevel);

  // Adapters
  const supabase = createSupabaseAdmin(config.supabase);
  const telegram = createTelegramClient({
    botToken: config.telegram.botToken,
    fetchFn,
  });
  const redis = createRedis(config.rateLimit.redis);

  // Services
  const userService = createUserService({
    db: createUserServiceDb(supabase),
    logger: logger.child('users'),
    adminUserId: config.adminUserId,
  });

  const custodyService = createCustodyService({
    db: createCustodyServiceDb(supabase),
    transport: createTelegramTransport({
      client: telegram,
      storageChannelId: config.telegram.storageChannelId,
      logger: logger.child('transport'),
    }),
    logger: logger.child('custody'),
    transportTimeoutMs: config.transportTimeoutMs,
  });

  const shareUrl = (fileId: string) =>
    `https://t.me/${config.telegram.botUsername}?start=${fileId}`;

  const bot = createBotHandler({
    custodyService,
    userService,
    api: createBotApi(telegram),
    botUsername: config.telegram.botUsername,
    maxFileSizeBytes: config.upload.maxFileSizeBytes,
    logger: logger.child('bot'),
  });

  const app = createApp({
    services: { custodyService, userService },
    bot,
    logger,
    apiToken: config.api.token,
    adminUserId: config.adminUserId,
    webhookSecret: config.telegram.webhookSecret,
    maxFileSizeBytes: config.upload.maxFileSizeBytes,
    shareUrl,
    rateLimiters: {
      uploads: createRateLimiter(redis, {
        limit: config.rateLimit.uploadsPerDay,
        window: DAY_SECONDS,
        prefix: 'uploads',
      }),
      downloads: createRateLimiter(redis, {
        limit: config.rateLimit.downloadsPerDay,
        window: DAY_SECONDS,
        prefix: 'downloads',
      }),
    },
    allowedOrigins: config.api.allowedOrigins,
  });

  return { app, logger };
}
