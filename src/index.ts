/**
 * Custody Drive Entry Point
 *
 * Loads configuration, wires the services and starts the Hono application.
 */

import 'dotenv/config';
import { serve } from '@hono/node-server';

import { buildApplication } from './container.js';
import { ConfigError, loadConfig } from './lib/config.js';

function readConfig() {
  try {
    return loadConfig(process.env);
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(error.message);
      process.exit(1);
    }
    throw error;
  }
}

const config = readConfig();
const { app, logger } = buildApplication(config);

logger.info(`Server starting on port ${config.api.port}`);
logger.info(`Supabase URL: ${config.supabase.url}`);

serve({
  fetch: app.fetch,
  port: config.api.port,
});

export { app };
