/**
 * Shared Library Exports
 * Common utilities used across the application
 */

export { createSupabaseAdmin } from './supabase.js';
export { createRedis } from './redis.js';
export { loadConfig, ConfigError } from './config.js';
export type { AppConfig, LogLevel } from './config.js';
export { createLogger } from './logger.js';
export type { Logger } from './logger.js';
export {
  defaultIdGenerator,
  newFileId,
  newShareCode,
  FILE_ID_LENGTH,
  SHARE_CODE_LENGTH,
} from './ids.js';
export type { IdGenerator } from './ids.js';
export { withTimeout, TimeoutError } from './timeout.js';
