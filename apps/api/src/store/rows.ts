import { z } from "zod";
import type { ProgramWorkout, Subscription, WorkoutLog } from "@skinin/shared";

export const subscriptionStatusSchema = z.enum(["active", "completed", "refunded", "forfeited"]);

export const subscriptionRowSchema = z.object({
  id: z.string().min(1),
  user_id: z.string().min(1),
  program_id: z.string().min(1),
  variation: z.coerce.number().int().min(1),
  activated_at: z.coerce.date(),
  program_length_weeks: z.coerce.number().int().min(1).max(52),
  required_workouts_per_week: z.coerce.number().int().min(1).max(7),
  // numeric columns come back as strings from PostgREST
  pledge_amount: z.coerce.number().nonnegative(),
  currency: z.string().min(1),
  status: subscriptionStatusSchema
});

export const workoutLogRowSchema = z.object({
  id: z.string().min(1),
  user_id: z.string().min(1),
  subscription_id: z.string().min(1),
  workout_id: z.string().min(1),
  logged_at: z.coerce.date(),
  week_number: z.coerce.number().int().min(1)
});

export const programWorkoutRowSchema = z.object({
  id: z.string().min(1),
  program_id: z.string().min(1),
  week_number: z.coerce.number().int().min(1),
  day_number: z.coerce.number().int().min(1),
  variation: z.coerce.number().int().min(1),
  title: z.string(),
  description: z.string().nullable().optional()
});

export type SubscriptionRow = z.infer<typeof subscriptionRowSchema>;
export type WorkoutLogRow = z.infer<typeof workoutLogRowSchema>;
export type ProgramWorkoutRow = z.infer<typeof programWorkoutRowSchema>;

export function toSubscription(r: SubscriptionRow): Subscription {
  return {
    id: r.id,
    userId: r.user_id,
    programId: r.program_id,
    variation: r.variation,
    activatedAt: r.activated_at,
    programLengthWeeks: r.program_length_weeks,
    requiredWorkoutsPerWeek: r.required_workouts_per_week,
    pledgeAmount: r.pledge_amount,
    currency: r.currency,
    status: r.status
  };
}

export function toWorkoutLog(r: WorkoutLogRow): WorkoutLog {
  return {
    id: r.id,
    userId: r.user_id,
    subscriptionId: r.subscription_id,
    workoutId: r.workout_id,
    loggedAt: r.logged_at,
    weekNumber: r.week_number
  };
}

export function toProgramWorkout(r: ProgramWorkoutRow): ProgramWorkout {
  return {
    id: r.id,
    programId: r.program_id,
    weekNumber: r.week_number,
    dayNumber: r.day_number,
    variation: r.variation,
    title: r.title,
    description: r.description ?? ""
  };
}

export function byLoggedAtThenId(a: WorkoutLog, b: WorkoutLog): number {
  return a.loggedAt.getTime() - b.loggedAt.getTime() || (a.id < b.id ? -1 : a.id > b.id ? 1 : 0);
}
