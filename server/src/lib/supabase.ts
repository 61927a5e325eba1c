import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import { getConfig } from './config.js';

let supabaseAdmin: SupabaseClient | null = null;

/**
 * Lazily create the service-role client so the memory store backend and the
 * test suite can import storage modules without Supabase credentials.
 */
export function getSupabaseAdmin(): SupabaseClient {
  if (supabaseAdmin) return supabaseAdmin;

  const { supabaseUrl, supabaseServiceKey } = getConfig().store;
  if (!supabaseUrl || !supabaseServiceKey) {
    throw new Error('SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY environment variables are required when STORE_BACKEND=supabase');
  }
  supabaseAdmin = createClient(supabaseUrl, supabaseServiceKey, {
    auth: { persistSession: false, autoRefreshToken: false },
  });
  return supabaseAdmin;
}
