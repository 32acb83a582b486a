import type { SupabaseClient } from "@supabase/supabase-js";
import { claimsUserResolver, supabaseUserResolver, type ResolveUser } from "./auth.js";
import { createSupabaseAdmin, usesSupabase, type Env } from "./config.js";
import { buildServer } from "./server.js";
import { MemoryStore, loadMemorySeed } from "./store/memory.js";
import { SupabaseStore } from "./store/supabase.js";
import type { AdherenceStore } from "./store/types.js";

function buildStore(env: Env, supabaseAdmin: SupabaseClient | null): AdherenceStore {
  if (env.STORE_DRIVER === "memory") {
    return env.MEMORY_SEED_FILE ? loadMemorySeed(env.MEMORY_SEED_FILE) : new MemoryStore();
  }
  if (!supabaseAdmin) throw new Error("Supabase store selected without Supabase config");
  return new SupabaseStore(supabaseAdmin);
}

function buildResolver(env: Env, supabaseAdmin: SupabaseClient | null): ResolveUser {
  if (env.AUTH_MODE === "claims") return claimsUserResolver();
  if (!supabaseAdmin) throw new Error("Supabase auth selected without Supabase config");
  return supabaseUserResolver(supabaseAdmin);
}

// Wires the server from validated env; index.ts only adds listen().
export function createApp(env: Env) {
  const supabaseAdmin = usesSupabase(env) ? createSupabaseAdmin(env) : null;
  return buildServer({
    store: buildStore(env, supabaseAdmin),
    resolveUser: buildResolver(env, supabaseAdmin),
    adminToken: env.ADMIN_DASHBOARD_TOKEN,
    logger: { level: env.LOG_LEVEL }
  });
}
