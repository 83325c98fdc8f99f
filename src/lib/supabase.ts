/**
 * Supabase Client Configuration
 * The service runs with the service-role key; row access rules live in the
 * custody engine, not in RLS policies.
 */

import { createClient, type SupabaseClient } from '@supabase/supabase-js';

import type { AppConfig } from './config.js';

/**
 * Create the admin client used by the store adapters
 */
export function createSupabaseAdmin(
  config: AppConfig['supabase']
): SupabaseClient {
  return createClient(config.url, config.serviceKey, {
    auth: {
      autoRefreshToken: false,
      persistSession: false,
      detectSessionInUrl: false,
    },
  });
}
