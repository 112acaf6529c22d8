/**
 * Adoption Radar: Supabase Client
 *
 * Service-role client for the snapshot store. Created on demand from
 * explicit settings so that file-backed runs never need Supabase
 * credentials.
 */

import { createClient } from '@supabase/supabase-js';
import type { SupabaseClient } from '@supabase/supabase-js';

export interface SupabaseSettings {
  url: string;
  serviceRoleKey: string;
}

/**
 * Admin Supabase client for background runs.
 * Bypasses Row Level Security (RLS) policies.
 */
export function createAdminClient(settings: SupabaseSettings): SupabaseClient {
  return createClient(settings.url, settings.serviceRoleKey, {
    auth: {
      autoRefreshToken: false,
      persistSession: false,
    },
  });
}

/**
 * Handle Supabase errors consistently
 */
export function handleSupabaseError(error: unknown): Error {
  if (error && typeof error === 'object' && 'message' in error && typeof error.message === 'string') {
    const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
    return new Error(`Supabase error: ${error.message}${code ? ` (code: ${code})` : ''}`);
  }
  return new Error('Unknown Supabase error');
}

/**
 * Row shape of the run_snapshots table.
 */
export interface RunSnapshotRow {
  run_id: string;
  collected_at: string;
  metrics: unknown;
  records: unknown;
}
