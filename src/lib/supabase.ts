/**
 * Supabase Client Configuration
 *
 * The service key bypasses RLS: the API enforces access itself and this
 * client is never handed to user-facing code.
 */

import { createClient, type SupabaseClient } from '@supabase/supabase-js';

export function createSupabaseAdmin(config: {
  url: string;
  serviceKey: string;
}): SupabaseClient {
  if (config.url === '' || config.serviceKey === '') {
    throw new Error('Supabase URL and service key are required');
  }
  return createClient(config.url, config.serviceKey, {
    auth: {
      autoRefreshToken: false,
      persistSession: false,
      detectSessionInUrl: false,
    },
  });
}
