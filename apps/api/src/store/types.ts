import type { ProgramWorkout, Subscription, SubscriptionStatus, WorkoutLog } from "@skinin/shared";

export type NewWorkoutLog = {
  userId: string;
  subscriptionId: string;
  workoutId: string;
  loggedAt: Date;
  weekNumber: number;
  /** Refuse the insert if the user has a log later than `loggedAt - cooldownMs`. */
  cooldownMs: number;
};

export interface AdherenceStore {
  getActiveSubscription(userId: string): Promise<Subscription | null>;
  getSettleableSubscription(userId: string): Promise<Subscription | null>;
  getLatestLog(userId: string): Promise<WorkoutLog | null>;
  /** Logs with `from <= loggedAt < to`, oldest first. */
  listLogs(params: { subscriptionId: string; from: Date; to: Date }): Promise<WorkoutLog[]>;
  getProgramWorkout(programId: string, workoutId: string): Promise<ProgramWorkout | null>;
  listProgramWorkouts(params: { programId: string; weekNumber: number; variation: number }): Promise<ProgramWorkout[]>;
  /** Conditional append. Resolves null when the cooldown guard refuses the row. */
  appendLog(input: NewWorkoutLog): Promise<WorkoutLog | null>;
  updateSubscriptionStatus(id: string, status: SubscriptionStatus, at: Date): Promise<void>;
}
