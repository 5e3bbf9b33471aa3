import { createClient as createSupabaseClient, type SupabaseClient } from "@supabase/supabase-js";
import { readEnv } from "@/lib/env";

let clientInstance: SupabaseClient | null = null;

// Server-side client on the service role key; null when Supabase isn't configured
export function createClient(): SupabaseClient | null {
  const { supabaseUrl, supabaseServiceRoleKey } = readEnv();

  if (!supabaseUrl || !supabaseServiceRoleKey) {
    return null;
  }

  if (clientInstance) {
    return clientInstance;
  }

  clientInstance = createSupabaseClient(supabaseUrl, supabaseServiceRoleKey, {
    auth: { persistSession: false, autoRefreshToken: false },
  });

  return clientInstance;
}
