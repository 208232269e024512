/**
 * Supabase Client
 * Singleton client for trace export
 */

import { createClient, type SupabaseClient } from "@supabase/supabase-js";
import { ConfigError, getConfig } from "@salesiq/core";

let supabaseInstance: SupabaseClient | null = null;

/**
 * Get the Supabase client instance
 * Lazy-loaded singleton
 */
export function getSupabase(): SupabaseClient {
  if (!supabaseInstance) {
    const supabase = getConfig().supabase;

    if (!supabase) {
      throw new ConfigError(
        "Missing Supabase configuration. Set SUPABASE_URL and SUPABASE_KEY environment variables."
      );
    }

    supabaseInstance = createClient(supabase.url, supabase.key, {
      auth: {
        autoRefreshToken: false,
        persistSession: false,
      },
    });
  }

  return supabaseInstance;
}

/**
 * Check if Supabase is configured
 */
export function isSupabaseConfigured(): boolean {
  return getConfig().supabase !== undefined;
}

/**
 * Reset client (for testing)
 */
export function resetSupabase(): void {
  supabaseInstance = null;
}
