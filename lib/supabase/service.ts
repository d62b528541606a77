import { createClient, type SupabaseClient } from "@supabase/supabase-js";

let supabaseService: SupabaseClient | null = null;
let supabaseServiceKey: string | null = null;

/**
 * Service-role client for server-side reads (model bundle storage).
 * Returns null when the environment is not configured.
 */
export function getSupabaseService(
  url: string | null,
  serviceKey: string | null,
  options: { fetch?: typeof fetch } = {}
): SupabaseClient | null {
  if (!url || !serviceKey) return null;

  const cacheKey = `${url}:${serviceKey}`;
  if (supabaseService && supabaseServiceKey === cacheKey && !options.fetch) return supabaseService;

  const client = createClient(url, serviceKey, {
    auth: { autoRefreshToken: false, persistSession: false },
    global: options.fetch ? { fetch: options.fetch } : undefined,
  });

  if (!options.fetch) {
    supabaseService = client;
    supabaseServiceKey = cacheKey;
  }
  return client;
}
