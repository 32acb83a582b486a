import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { createClient, type SupabaseClient } from "@supabase/supabase-js";

export function loadEnvLocal(envPath = defaultEnvPath(), target: NodeJS.ProcessEnv = process.env): void {
  // env.local instead of .env; never overrides variables already set.
  if (!fs.existsSync(envPath)) return;
  const raw = fs.readFileSync(envPath, "utf8");
  for (const line of raw.split(/\r?\n/)) {
    const s = line.trim();
    if (!s || s.startsWith("#")) continue;
    const idx = s.indexOf("=");
    if (idx < 0) continue;
    const key = s.slice(0, idx).trim();
    const value = s.slice(idx + 1).trim();
    if (!key) continue;
    if (target[key] === undefined && value !== "") {
      target[key] = value;
    }
  }
}

function defaultEnvPath(): string {
  const here = path.dirname(fileURLToPath(import.meta.url));
  return path.resolve(here, "..", "env.local");
}

export type StoreDriver = "supabase" | "memory";
export type AuthMode = "supabase" | "claims";
export type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace" | "silent";

export type Env = {
  PORT: number;
  HOST: string;
  LOG_LEVEL: LogLevel;
  STORE_DRIVER: StoreDriver;
  AUTH_MODE: AuthMode;
  SUPABASE_URL?: string | undefined;
  SUPABASE_SERVICE_ROLE_KEY?: string | undefined;
  MEMORY_SEED_FILE?: string | undefined;
  ADMIN_DASHBOARD_TOKEN?: string | undefined;
};

const LOG_LEVELS: readonly LogLevel[] = ["fatal", "error", "warn", "info", "debug", "trace", "silent"];

function oneOf<T extends string>(key: string, value: string | undefined, allowed: readonly T[], fallback: T): T {
  if (!value) return fallback;
  const found = allowed.find((a) => a === value);
  if (!found) throw new Error(`Invalid env ${key}: ${value} (expected one of ${allowed.join(", ")})`);
  return found;
}

function parsePort(value: string | undefined): number {
  const port = Number(value || "3001");
  if (!Number.isInteger(port) || port <= 0 || port > 65535) throw new Error(`Invalid env PORT: ${value}`);
  return port;
}

export function getEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const read = (k: string) => source[k]?.trim() || undefined;

  const env: Env = {
    PORT: parsePort(read("PORT")),
    HOST: read("HOST") || "0.0.0.0",
    LOG_LEVEL: oneOf("LOG_LEVEL", read("LOG_LEVEL"), LOG_LEVELS, "info"),
    STORE_DRIVER: oneOf("STORE_DRIVER", read("STORE_DRIVER"), ["supabase", "memory"] as const, "supabase"),
    AUTH_MODE: oneOf("AUTH_MODE", read("AUTH_MODE"), ["supabase", "claims"] as const, "supabase"),
    SUPABASE_URL: read("SUPABASE_URL"),
    SUPABASE_SERVICE_ROLE_KEY: read("SUPABASE_SERVICE_ROLE_KEY"),
    MEMORY_SEED_FILE: read("MEMORY_SEED_FILE"),
    ADMIN_DASHBOARD_TOKEN: read("ADMIN_DASHBOARD_TOKEN")
  };

  if (usesSupabase(env)) {
    for (const k of ["SUPABASE_URL", "SUPABASE_SERVICE_ROLE_KEY"] as const) {
      if (!env[k]) throw new Error(`Missing env: ${k}`);
    }
  }
  return env;
}

export function usesSupabase(env: Env): boolean {
  return env.STORE_DRIVER === "supabase" || env.AUTH_MODE === "supabase";
}

export function createSupabaseAdmin(env: Env): SupabaseClient {
  if (!env.SUPABASE_URL || !env.SUPABASE_SERVICE_ROLE_KEY) {
    throw new Error("Supabase is not configured");
  }
  return createClient(env.SUPABASE_URL, env.SUPABASE_SERVICE_ROLE_KEY, {
    auth: { persistSession: false }
  });
}
