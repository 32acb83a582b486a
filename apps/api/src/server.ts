import Fastify, { type FastifyServerOptions } from "fastify";
import cors from "@fastify/cors";
import { type Clock, systemClock } from "@skinin/shared";
import type { ResolveUser } from "./auth.js";
import { EngineError } from "./errors.js";
import { registerAdminRoutes } from "./routes/admin.js";
import { errorBody } from "./routes/context.js";
import { registerSubscriptionRoutes } from "./routes/subscription.js";
import { registerWorkoutLogRoutes } from "./routes/workoutLogs.js";
import { registerWorkoutRoutes } from "./routes/workouts.js";
import { createAdherenceEngine } from "./services/engine.js";
import type { AdherenceStore } from "./store/types.js";

export type ServerOptions = {
  store: AdherenceStore;
  resolveUser: ResolveUser;
  clock?: Clock;
  adminToken?: string | undefined;
  logger?: FastifyServerOptions["logger"];
};

function clientError(error: unknown): { statusCode: number; message: string; code: string } | null {
  if (!(error instanceof Error) || !("statusCode" in error)) return null;
  const { statusCode } = error;
  if (typeof statusCode !== "number" || statusCode < 400 || statusCode >= 500) return null;
  const code = "code" in error && typeof error.code === "string" && error.code ? error.code : "bad_request";
  return { statusCode, message: error.message, code };
}

export function buildServer(opts: ServerOptions) {
  const app = Fastify({
    logger: opts.logger ?? { level: "info" }
  });

  void app.register(cors, { origin: true });

  app.setErrorHandler((error, request, reply) => {
    if (error instanceof EngineError) {
      if (error.statusCode >= 500) request.log.error({ err: error }, error.message);
      reply.code(error.statusCode);
      return errorBody(error.message, error.code, error.statusCode < 500 ? error.details : undefined);
    }
    // Fastify's own client errors (bad JSON, body too large)
    const client = clientError(error);
    if (client) {
      reply.code(client.statusCode);
      return errorBody(client.message, client.code);
    }
    request.log.error({ err: error }, "unhandled error");
    reply.code(500);
    return errorBody("Internal server error", "internal_error");
  });

  const clock = opts.clock ?? systemClock;
  const engine = createAdherenceEngine({ store: opts.store, logger: app.log });
  const ctx = { engine, resolveUser: opts.resolveUser, clock, adminToken: opts.adminToken };

  app.get("/health", async () => {
    return { ok: true, service: "skinin-api", ts: clock().toISOString() };
  });

  registerWorkoutLogRoutes(app, ctx);
  registerWorkoutRoutes(app, ctx);
  registerSubscriptionRoutes(app, ctx);
  registerAdminRoutes(app, ctx);

  return app;
}
