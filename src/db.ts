/**
 * Supabase client construction.
 * The client is created once at startup and handed to every repository.
 */

import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import type { MonitorConfig } from './config.js';

export function createSupabaseClient(config: Pick<MonitorConfig, 'supabaseUrl' | 'supabaseServiceRoleKey'>): SupabaseClient {
  return createClient(config.supabaseUrl, config.supabaseServiceRoleKey, {
    auth: { persistSession: false, autoRefreshToken: false },
  });
}
