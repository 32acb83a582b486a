import type { FastifyInstance } from "fastify";
import { z } from "zod";
import { requireUser } from "../auth.js";
import { ValidationError } from "../errors.js";
import { NOT_SUBSCRIBED_MESSAGE, errorBody, type RouteContext } from "./context.js";

const createLogBody = z.object({
  workout_id: z.string().trim().min(1).max(128)
});

export function registerWorkoutLogRoutes(app: FastifyInstance, ctx: RouteContext) {
  // POST /api/workout-logs
  // body: { workout_id: string }. The log time is always the server's clock.
  app.post("/api/workout-logs", async (req, reply) => {
    const userId = await requireUser(req, ctx.resolveUser);
    const parsed = createLogBody.safeParse(req.body ?? {});
    if (!parsed.success) throw new ValidationError("workout_id is required", "workout_id");

    const result = await ctx.engine.requestWorkoutLog(userId, parsed.data.workout_id, ctx.clock());
    if (result.ok) {
      reply.code(201);
      return {
        log: {
          id: result.log.id,
          workout_id: result.log.workoutId,
          week_number: result.log.weekNumber,
          logged_at: result.log.loggedAt.toISOString()
        },
        cooldown: {
          unlocks_at: result.cooldown.unlocksAt?.toISOString() ?? null,
          hours_remaining: result.cooldown.hoursRemaining
        }
      };
    }

    switch (result.error) {
      case "cooldown_active":
        reply.code(429);
        return errorBody("Next workout is still locked by the cooldown.", "cooldown_active", {
          hours_remaining: result.hoursRemaining,
          unlocks_at: result.unlocksAt.toISOString()
        });
      case "not_subscribed":
        reply.code(403);
        return errorBody(NOT_SUBSCRIBED_MESSAGE, "not_subscribed");
      case "workout_not_found":
        reply.code(404);
        return errorBody("Workout is not part of your program.", "workout_not_found");
      case "program_ended":
        reply.code(409);
        return errorBody("Your program has ended.", "program_ended", {
          program_ends_at: result.programEndsAt.toISOString()
        });
    }
  });

  // GET /api/workout-logs/cooldown-status
  app.get("/api/workout-logs/cooldown-status", async (req) => {
    const userId = await requireUser(req, ctx.resolveUser);
    const window = await ctx.engine.getCooldownStatus(userId, ctx.clock());
    return {
      cooldown_active: window.active,
      unlocks_at: window.active && window.unlocksAt ? window.unlocksAt.toISOString() : null,
      hours_remaining: window.hoursRemaining
    };
  });
}
