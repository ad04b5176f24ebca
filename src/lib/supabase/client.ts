import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import { getServerConfig } from '../config';

let client: SupabaseClient | null = null;

/**
 * Server-side Supabase client for the analytical store.
 * Uses the service key, so it must never be imported from client components.
 * Created on first use so that modules importing it stay loadable without
 * credentials.
 */
export function getSupabase(): SupabaseClient {
  if (client) return client;

  const config = getServerConfig();
  client = createClient(config.SUPABASE_URL, config.SUPABASE_SERVICE_KEY, {
    auth: { persistSession: false, autoRefreshToken: false },
  });
  return client;
}
