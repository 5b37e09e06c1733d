/**
 * AuthService Database Adapter
 * Reads the caller's role from the Supabase `profiles` table
 */

import type { SupabaseClient } from '@supabase/supabase-js';

import type { AuthServiceDb } from './auth.service.js';

interface ProfileRow {
  role: string;
}

export function createAuthServiceDb(supabase: SupabaseClient): AuthServiceDb {
  return {
    async getRole(userId: string): Promise<string | null> {
      const { data, error } = await supabase
        .from('profiles')
        .select('role')
        .eq('id', userId)
        .maybeSingle();

      if (error !== null) {
        throw new Error(`Failed to get profile: ${error.message}`);
      }

      return data === null ? null : (data as ProfileRow).role;
    },
  };
}
