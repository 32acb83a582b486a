import type { FastifyInstance } from "fastify";
import { requireUser } from "../auth.js";
import { NOT_SUBSCRIBED_MESSAGE, errorBody, type RouteContext } from "./context.js";

export function registerWorkoutRoutes(app: FastifyInstance, ctx: RouteContext) {
  // GET /api/workouts/current-week
  app.get("/api/workouts/current-week", async (req, reply) => {
    const userId = await requireUser(req, ctx.resolveUser);
    const result = await ctx.engine.getCurrentWeekStatus(userId, ctx.clock());
    if (!result.ok) {
      reply.code(404);
      return errorBody(NOT_SUBSCRIBED_MESSAGE, "not_subscribed");
    }
    const { view } = result;
    return {
      week_number: view.weekNumber,
      variation: view.variation,
      cooldown_active: view.cooldown.active,
      hours_remaining: view.cooldown.hoursRemaining,
      amount_paid: view.amountPaid,
      week_ends_at: view.weekEndsAt.toISOString(),
      workouts: view.workouts.map((w) => ({
        id: w.id,
        title: w.title,
        description: w.description,
        day_number: w.dayNumber,
        status: w.status,
        logged_date: w.loggedDate
      }))
    };
  });
}
