import type { FastifyInstance } from "fastify";
import { requireUser } from "../auth.js";
import { NOT_SUBSCRIBED_MESSAGE, errorBody, type RouteContext } from "./context.js";

export function registerSubscriptionRoutes(app: FastifyInstance, ctx: RouteContext) {
  // GET /api/subscription/eligibility
  // Refund status recomputed from the full week history on every call.
  app.get("/api/subscription/eligibility", async (req, reply) => {
    const userId = await requireUser(req, ctx.resolveUser);
    const result = await ctx.engine.getEligibility(userId, ctx.clock());
    if (!result.ok) {
      reply.code(404);
      return errorBody(NOT_SUBSCRIBED_MESSAGE, "not_subscribed");
    }
    const e = result.eligibility;
    return {
      refund_eligible: e.refundEligible,
      grace_weeks_remaining: e.graceWeeksRemaining,
      lost_at_week: e.lostAtWeek,
      current_week: e.currentWeek.weekNumber,
      week_ends_at: e.currentWeek.weekEndsAt.toISOString(),
      required_per_week: e.requiredPerWeek,
      current_week_completed: e.openWeek?.completedCount ?? null,
      weeks: e.weeks.map((w) => ({
        week_number: w.weekNumber,
        week_starts_at: w.windowStart.toISOString(),
        week_ends_at: w.windowEnd.toISOString(),
        completed_count: w.completedCount,
        required: w.required,
        outcome: w.outcome,
        grace_used: w.graceDayUsed
      }))
    };
  });
}
