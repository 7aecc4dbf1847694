import { createClient, type SupabaseClient } from '@supabase/supabase-js';

//Creates an admin Supabase client with the service role key.
//Bypasses Row Level Security (RLS): the verdict cache is shared by every caller, not tied to a user session.

export type AdminClientOptions = {
  url: string;
  serviceRoleKey: string;
  fetch?: typeof fetch; // lets tests answer PostgREST in-process
};

export function getAdminClient({ url, serviceRoleKey, fetch: customFetch }: AdminClientOptions): SupabaseClient {
  return createClient(url, serviceRoleKey, {
    auth: {
      persistSession: false, //no session to keep between runs on a backend
      autoRefreshToken: false,
    },
    ...(customFetch ? { global: { fetch: customFetch } } : {}),
  });
}
