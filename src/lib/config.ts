/**
 * Application Configuration
 *
 * Parsed once at boot from the environment and passed explicitly to the
 * pieces that need it. Nothing reads process.env after this point.
 */

import { z } from 'zod';

const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value === undefined || value === '' ? null : value));

const configSchema = z.object({
  SUPABASE_URL: z.string().url(),
  SUPABASE_SERVICE_KEY: z.string().min(1),
  TELEGRAM_BOT_TOKEN: z.string().min(1),
  TELEGRAM_BOT_USERNAME: z.string().min(1),
  TELEGRAM_STORAGE_CHANNEL_ID: z.string().regex(/^-?\d+$/),
  TELEGRAM_WEBHOOK_SECRET: z.string().min(1),
  API_TOKEN: z.string().min(16),
  ADMIN_USER_ID: optionalString,
  PORT: z.coerce.number().int().positive().default(3000),
  MAX_FILE_SIZE_MB: z.coerce.number().int().positive().default(2000),
  TRANSPORT_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  UPLOADS_PER_DAY: z.coerce.number().int().positive().default(100),
  DOWNLOADS_PER_DAY: z.coerce.number().int().positive().default(1000),
  UPSTASH_REDIS_URL: optionalString,
  UPSTASH_REDIS_TOKEN: optionalString,
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  ALLOWED_ORIGINS: z
    .string()
    .default('http://localhost:3000')
    .transform((value) =>
      value
        .split(',')
        .map((origin) => origin.trim())
        .filter((origin) => origin.length > 0)
    ),
});

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface AppConfig {
  supabase: { url: string; serviceKey: string };
  telegram: {
    botToken: string;
    botUsername: string;
    storageChannelId: string;
    webhookSecret: string;
  };
  api: {
    port: number;
    token: string;
    allowedOrigins: string[];
  };
  adminUserId: string | null;
  upload: { maxFileSizeBytes: number };
  transportTimeoutMs: number;
  rateLimit: {
    uploadsPerDay: number;
    downloadsPerDay: number;
    redis: { url: string; token: string } | null;
  };
  logLevel: LogLevel;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Build the application config from environment variables
 * Throws ConfigError naming every invalid key
 */
export function loadConfig(
  env: Record<string, string | undefined>
): AppConfig {
  const parsed = configSchema.safeParse(env);
  if (!parsed.success) {
    const keys = parsed.error.issues.map((issue) => issue.path.join('.'));
    throw new ConfigError(
      `Invalid configuration: ${[...new Set(keys)].join(', ')}`
    );
  }

  const values = parsed.data;
  const redis =
    values.UPSTASH_REDIS_URL !== null && values.UPSTASH_REDIS_TOKEN !== null
      ? { url: values.UPSTASH_REDIS_URL, token: values.UPSTASH_REDIS_TOKEN }
      : null;

  return Object.freeze({
    supabase: {
      url: values.SUPABASE_URL,
      serviceKey: values.SUPABASE_SERVICE_KEY,
    },
    telegram: {
      botToken: values.TELEGRAM_BOT_TOKEN,
      botUsername: values.TELEGRAM_BOT_USERNAME,
      storageChannelId: values.TELEGRAM_STORAGE_CHANNEL_ID,
      webhookSecret: values.TELEGRAM_WEBHOOK_SECRET,
    },
    api: {
      port: values.PORT,
      token: values.API_TOKEN,
      allowedOrigins: values.ALLOWED_ORIGINS,
    },
    adminUserId: values.ADMIN_USER_ID,
    upload: { maxFileSizeBytes: values.MAX_FILE_SIZE_MB * 1024 * 1024 },
    transportTimeoutMs: values.TRANSPORT_TIMEOUT_MS,
    rateLimit: {
      uploadsPerDay: values.UPLOADS_PER_DAY,
      downloadsPerDay: values.DOWNLOADS_PER_DAY,
      redis,
    },
    logLevel: values.LOG_LEVEL,
  });
}
