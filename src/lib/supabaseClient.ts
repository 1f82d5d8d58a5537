import { createClient, SupabaseClient } from '@supabase/supabase-js';
import type { AuthStorage } from '../storage/authStorage';

type SupabaseClientOptions = {
  supabaseUrl: string;
  supabaseAnonKey: string;
  /** Where the auth session survives restarts; omit to keep it in memory only. */
  authStorage?: AuthStorage;
  fetch?: typeof fetch;
};

export const createSupabaseClient = ({
  supabaseUrl,
  supabaseAnonKey,
  authStorage,
  fetch: customFetch,
}: SupabaseClientOptions): SupabaseClient => {
  return createClient(supabaseUrl, supabaseAnonKey, {
    auth: {
      storage: authStorage,
      persistSession: !!authStorage,
      autoRefreshToken: !!authStorage,
      detectSessionInUrl: false,
    },
    global: customFetch ? { fetch: customFetch } : undefined,
  });
};
