import { createClient, type SupabaseClient } from "@supabase/supabase-js";
import type { PipelineConfig } from "../config/pipelineConfig";

// One client per project URL and key.
const clients = new Map<string, SupabaseClient>();

export function getSupabaseClient(config: Pick<PipelineConfig, "supabase">): SupabaseClient {
  const { url, serviceRoleKey } = config.supabase;
  const cacheKey = `${url}|${serviceRoleKey}`;
  const cached = clients.get(cacheKey);
  if (cached) return cached;

  const client = createClient(url, serviceRoleKey, {
    auth: { persistSession: false },
  });
  clients.set(cacheKey, client);
  return client;
}
