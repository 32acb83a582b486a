import type { FastifyInstance } from "fastify";
import { z } from "zod";
import { requireAdminToken } from "../auth.js";
import { ValidationError } from "../errors.js";
import { errorBody, type RouteContext } from "./context.js";

const settleParams = z.object({ userId: z.string().trim().min(1) });

// --- Admin (shared token via x-admin-token) ---
export function registerAdminRoutes(app: FastifyInstance, ctx: RouteContext) {
  // POST /admin/subscriptions/:userId/settle
  // Closes a finished program: refunded when eligibility held, forfeited otherwise.
  app.post("/admin/subscriptions/:userId/settle", async (req, reply) => {
    requireAdminToken(req, ctx.adminToken);
    const params = settleParams.safeParse(req.params);
    if (!params.success) throw new ValidationError("userId is required", "userId");

    const result = await ctx.engine.settle(params.data.userId, ctx.clock());
    if (result.ok) {
      return {
        outcome: result.settlement.outcome,
        refund_amount: result.settlement.refundAmount,
        currency: result.settlement.currency,
        status: result.status
      };
    }
    if (result.error === "not_subscribed") {
      reply.code(404);
      return errorBody("No subscription awaiting settlement.", "not_subscribed");
    }
    reply.code(409);
    return errorBody("Program is still running.", "program_in_progress", {
      program_ends_at: result.settlement.programEndsAt.toISOString()
    });
  });
}
