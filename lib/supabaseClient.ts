import { createClient, type SupabaseClient } from "@supabase/supabase-js";
import { getSupabaseEnv } from "@/lib/env.server";
import { NodeRealtimeSocket } from "@/lib/realtimeTransport";

/**
 * Creates a client that acts as the holder of `accessToken`: every PostgREST
 * request carries it as the bearer token, so row-level security sees the user.
 * Realtime gets an explicit socket because Node 20 has no global WebSocket.
 */
export function createUserSupabaseClient(accessToken: string): SupabaseClient {
  const { url, anonKey } = getSupabaseEnv();
  return createClient(url, anonKey, {
    auth: { persistSession: false, autoRefreshToken: false, detectSessionInUrl: false },
    global: { headers: { Authorization: `Bearer ${accessToken}` } },
    realtime: { transport: NodeRealtimeSocket },
  });
}
