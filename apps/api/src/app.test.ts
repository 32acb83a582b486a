import path from "node:path";
import { fileURLToPath } from "node:url";
import { describe, it, expect, afterEach } from "vitest";
import { createApp } from "./app.js";
import { getEnv } from "./config.js";

const here = path.dirname(fileURLToPath(import.meta.url));
const seedFile = path.resolve(here, "../seed/demo.json");

function bearer(sub: string): string {
  const part = (v: unknown) => Buffer.from(JSON.stringify(v)).toString("base64url");
  return `Bearer ${part({ alg: "none" })}.${part({ sub })}.sig`;
}

describe("createApp", () => {
  let app: ReturnType<typeof createApp> | undefined;

  afterEach(async () => {
    await app?.close();
    app = undefined;
  });

  it("serves the seeded memory store with claims auth", async () => {
    app = createApp(
      getEnv({ STORE_DRIVER: "memory", AUTH_MODE: "claims", MEMORY_SEED_FILE: seedFile, LOG_LEVEL: "silent" })
    );

    const health = await app.inject({ method: "GET", url: "/health" });
    expect(health.statusCode).toBe(200);
    expect(health.json()).toMatchObject({ ok: true, service: "skinin-api" });

    const week = await app.inject({
      method: "GET",
      url: "/api/workouts/current-week",
      headers: { authorization: bearer("demo-user") }
    });
    expect(week.statusCode).toBe(200);
    expect(week.json()).toMatchObject({ variation: 1, amount_paid: 80 });

    const stranger = await app.inject({
      method: "GET",
      url: "/api/workouts/current-week",
      headers: { authorization: bearer("someone-else") }
    });
    expect(stranger.statusCode).toBe(404);
  });

  it("starts empty without a seed file", async () => {
    app = createApp(getEnv({ STORE_DRIVER: "memory", AUTH_MODE: "claims", LOG_LEVEL: "silent" }));
    const res = await app.inject({ method: "GET", url: "/api/subscription/eligibility", headers: { authorization: bearer("demo-user") } });
    expect(res.statusCode).toBe(404);
  });
});
