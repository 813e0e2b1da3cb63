import { createClient, SupabaseClient } from '@supabase/supabase-js'
import { config } from '../config/index.js'

let supabase: SupabaseClient | null = null

// createClient throws on a malformed URL, which is fatal at startup
export function getSupabaseClient(): SupabaseClient {
  if (!supabase) {
    supabase = createClient(config.supabaseUrl, config.supabaseKey, {
      auth: {
        persistSession: false,
        autoRefreshToken: false,
      },
    })
  }
  return supabase
}
