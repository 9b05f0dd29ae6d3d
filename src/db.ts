/**
 * Supabase client factory.
 * Server-side only: uses the service-role key and never persists a session.
 */

import { createClient, type SupabaseClient } from '@supabase/supabase-js';

let cached: SupabaseClient | null = null;

export function getSupabaseClient(opts?: {
  url?: string;
  serviceRoleKey?: string;
}): SupabaseClient {
  if (cached) return cached;

  const url = opts?.url ?? process.env.SUPABASE_URL;
  const key = opts?.serviceRoleKey ?? process.env.SUPABASE_SERVICE_ROLE_KEY;
  if (!url || !key) {
    throw new Error('SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY are required');
  }

  cached = createClient(url, key, {
    auth: { persistSession: false, autoRefreshToken: false },
  });
  return cached;
}
