import type { SupabaseClient } from "@supabase/supabase-js";
import type { z } from "zod";
import type { ProgramWorkout, Subscription, SubscriptionStatus, WorkoutLog } from "@skinin/shared";
import { StoreError } from "../errors.js";
import {
  programWorkoutRowSchema,
  subscriptionRowSchema,
  toProgramWorkout,
  toSubscription,
  toWorkoutLog,
  workoutLogRowSchema
} from "./rows.js";
import type { AdherenceStore, NewWorkoutLog } from "./types.js";

function parseRow<S extends z.ZodType>(schema: S, row: unknown, operation: string): z.output<S> {
  const parsed = schema.safeParse(row);
  if (!parsed.success) throw new StoreError(`${operation} returned a malformed row`, parsed.error);
  return parsed.data;
}

function rowsOf(data: unknown): unknown[] {
  return Array.isArray(data) ? data : [];
}

/**
 * Tables: subscriptions, workout_logs, program_workouts.
 * Inserts go through the `append_workout_log` function (supabase/migrations) so the cooldown
 * check and the insert share one transaction.
 */
export class SupabaseStore implements AdherenceStore {
  constructor(private readonly db: SupabaseClient) {}

  async getActiveSubscription(userId: string): Promise<Subscription | null> {
    const res = await this.db
      .from("subscriptions")
      .select("*")
      .eq("user_id", userId)
      .eq("status", "active")
      .order("activated_at", { ascending: false })
      .limit(1);
    if (res.error) throw new StoreError("getActiveSubscription", res.error);
    const row = rowsOf(res.data)[0];
    return row ? toSubscription(parseRow(subscriptionRowSchema, row, "getActiveSubscription")) : null;
  }

  async getSettleableSubscription(userId: string): Promise<Subscription | null> {
    const res = await this.db
      .from("subscriptions")
      .select("*")
      .eq("user_id", userId)
      .in("status", ["active", "completed"])
      .order("activated_at", { ascending: false })
      .limit(1);
    if (res.error) throw new StoreError("getSettleableSubscription", res.error);
    const row = rowsOf(res.data)[0];
    return row ? toSubscription(parseRow(subscriptionRowSchema, row, "getSettleableSubscription")) : null;
  }

  async getLatestLog(userId: string): Promise<WorkoutLog | null> {
    const res = await this.db
      .from("workout_logs")
      .select("*")
      .eq("user_id", userId)
      .order("logged_at", { ascending: false })
      .order("id", { ascending: false })
      .limit(1);
    if (res.error) throw new StoreError("getLatestLog", res.error);
    const row = rowsOf(res.data)[0];
    return row ? toWorkoutLog(parseRow(workoutLogRowSchema, row, "getLatestLog")) : null;
  }

  async listLogs(params: { subscriptionId: string; from: Date; to: Date }): Promise<WorkoutLog[]> {
    const res = await this.db
      .from("workout_logs")
      .select("*")
      .eq("subscription_id", params.subscriptionId)
      .gte("logged_at", params.from.toISOString())
      .lt("logged_at", params.to.toISOString())
      .order("logged_at", { ascending: true });
    if (res.error) throw new StoreError("listLogs", res.error);
    return rowsOf(res.data).map((r) => toWorkoutLog(parseRow(workoutLogRowSchema, r, "listLogs")));
  }

  async getProgramWorkout(programId: string, workoutId: string): Promise<ProgramWorkout | null> {
    const res = await this.db
      .from("program_workouts")
      .select("*")
      .eq("program_id", programId)
      .eq("id", workoutId)
      .maybeSingle();
    if (res.error) throw new StoreError("getProgramWorkout", res.error);
    return res.data ? toProgramWorkout(parseRow(programWorkoutRowSchema, res.data, "getProgramWorkout")) : null;
  }

  async listProgramWorkouts(params: { programId: string; weekNumber: number; variation: number }): Promise<ProgramWorkout[]> {
    const res = await this.db
      .from("program_workouts")
      .select("*")
      .eq("program_id", params.programId)
      .eq("week_number", params.weekNumber)
      .eq("variation", params.variation)
      .order("day_number", { ascending: true });
    if (res.error) throw new StoreError("listProgramWorkouts", res.error);
    return rowsOf(res.data).map((r) => toProgramWorkout(parseRow(programWorkoutRowSchema, r, "listProgramWorkouts")));
  }

  async appendLog(input: NewWorkoutLog): Promise<WorkoutLog | null> {
    const res = await this.db.rpc("append_workout_log", {
      p_user_id: input.userId,
      p_subscription_id: input.subscriptionId,
      p_workout_id: input.workoutId,
      p_logged_at: input.loggedAt.toISOString(),
      p_week_number: input.weekNumber,
      p_cooldown_seconds: Math.round(input.cooldownMs / 1000)
    });
    if (res.error) throw new StoreError("appendLog", res.error);
    // setof: empty when the cooldown guard refused the insert
    const row = rowsOf(res.data)[0];
    return row ? toWorkoutLog(parseRow(workoutLogRowSchema, row, "appendLog")) : null;
  }

  async updateSubscriptionStatus(id: string, status: SubscriptionStatus, at: Date): Promise<void> {
    const settled = status === "refunded" || status === "forfeited";
    const res = await this.db
      .from("subscriptions")
      .update({ status, ...(settled ? { settled_at: at.toISOString() } : {}) })
      .eq("id", id);
    if (res.error) throw new StoreError("updateSubscriptionStatus", res.error);
  }
}
