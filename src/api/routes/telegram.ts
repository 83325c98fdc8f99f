/**
 * Telegram Webhook Route
 * Receives bot updates. Telegram retries anything but a 2xx, so handler
 * failures are logged and still acknowledged.
 */

import { timingSafeEqual } from 'node:crypto';

import { Hono } from 'hono';

import type { BotHandler } from '@/bot/handler.js';
import { updateSchema } from '@/bot/telegram.schema.js';
import type { Logger } from '@/lib/logger.js';

interface TelegramRoutesDeps {
  bot: BotHandler;
  webhookSecret: string;
  logger: Logger;
}

function secretMatches(given: string | undefined, expected: string): boolean {
  if (given === undefined) {
    return false;
  }
  const a = Buffer.from(given);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}

/**
 * Create Telegram webhook routes
 */
export function createTelegramRoutes(deps: TelegramRoutesDeps): Hono {
  const { bot, webhookSecret, logger } = deps;
  const app = new Hono();

  /**
   * POST /telegram/webhook
   */
  app.post('/telegram/webhook', async (c) => {
    const secret = c.req.header('X-Telegram-Bot-Api-Secret-Token');
    if (!secretMatches(secret, webhookSecret)) {
      return c.json({ ok: false }, 401);
    }

    let rawBody: unknown;
    try {
      rawBody = await c.req.json();
    } catch {
      rawBody = null;
    }

    const parsed = updateSchema.safeParse(rawBody);
    if (!parsed.success) {
      logger.warn('Ignoring malformed Telegram update', parsed.error.issues[0]);
      return c.json({ ok: true });
    }

    try {
      await bot.handleUpdate(parsed.data);
    } catch (error) {
      logger.error(`Failed to handle update ${parsed.data.update_id}`, error);
    }

    return c.json({ ok: true });
  });

  return app;
}
