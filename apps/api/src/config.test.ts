import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { describe, it, expect, afterEach } from "vitest";
import { getEnv, loadEnvLocal, usesSupabase } from "./config.js";

describe("getEnv", () => {
  it("applies defaults for a memory deployment", () => {
    const env = getEnv({ STORE_DRIVER: "memory", AUTH_MODE: "claims" });
    expect(env).toMatchObject({
      PORT: 3001,
      HOST: "0.0.0.0",
      LOG_LEVEL: "info",
      STORE_DRIVER: "memory",
      AUTH_MODE: "claims"
    });
    expect(usesSupabase(env)).toBe(false);
  });

  it("requires Supabase credentials by default", () => {
    expect(() => getEnv({})).toThrow("Missing env: SUPABASE_URL");
    expect(() => getEnv({ SUPABASE_URL: "http://localhost:54321" })).toThrow("Missing env: SUPABASE_SERVICE_ROLE_KEY");
  });

  it("accepts a full Supabase config", () => {
    const env = getEnv({ SUPABASE_URL: "http://localhost:54321", SUPABASE_SERVICE_ROLE_KEY: "test-secret", PORT: "8080" });
    expect(env.PORT).toBe(8080);
    expect(usesSupabase(env)).toBe(true);
  });

  it("rejects unknown values", () => {
    expect(() => getEnv({ STORE_DRIVER: "redis", AUTH_MODE: "claims" })).toThrow(
      "Invalid env STORE_DRIVER: redis (expected one of supabase, memory)"
    );
    expect(() => getEnv({ STORE_DRIVER: "memory", AUTH_MODE: "claims", PORT: "99999" })).toThrow("Invalid env PORT: 99999");
  });
});

describe("loadEnvLocal", () => {
  const dirs: string[] = [];

  afterEach(() => {
    for (const d of dirs.splice(0)) fs.rmSync(d, { recursive: true, force: true });
  });

  function writeEnv(contents: string): string {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "env-local-"));
    dirs.push(dir);
    const file = path.join(dir, "env.local");
    fs.writeFileSync(file, contents);
    return file;
  }

  it("fills missing keys without overriding existing ones", () => {
    const file = writeEnv("# comment\nPORT=4000\nHOST = 127.0.0.1\nEMPTY=\nnot a pair\n");
    const target: NodeJS.ProcessEnv = { PORT: "5000" };
    loadEnvLocal(file, target);
    expect(target).toEqual({ PORT: "5000", HOST: "127.0.0.1" });
  });

  it("ignores a missing file", () => {
    const target: NodeJS.ProcessEnv = {};
    loadEnvLocal(path.join(os.tmpdir(), "does-not-exist", "env.local"), target);
    expect(target).toEqual({});
  });
});
