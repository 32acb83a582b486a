import crypto from "node:crypto";
import fs from "node:fs";
import { z } from "zod";
import type { ProgramWorkout, Subscription, SubscriptionStatus, WorkoutLog } from "@skinin/shared";
import {
  byLoggedAtThenId,
  programWorkoutRowSchema,
  subscriptionRowSchema,
  toProgramWorkout,
  toSubscription,
  toWorkoutLog,
  workoutLogRowSchema
} from "./rows.js";
import type { AdherenceStore, NewWorkoutLog } from "./types.js";

// In-process store for local runs (STORE_DRIVER=memory) and tests. Restarting clears it.
export class MemoryStore implements AdherenceStore {
  private subscriptions: Subscription[] = [];
  private workouts: ProgramWorkout[] = [];
  private logs: WorkoutLog[] = [];

  constructor(seed?: { subscriptions?: Subscription[]; workouts?: ProgramWorkout[]; logs?: WorkoutLog[] }) {
    this.subscriptions = [...(seed?.subscriptions ?? [])];
    this.workouts = [...(seed?.workouts ?? [])];
    this.logs = [...(seed?.logs ?? [])];
  }

  addSubscription(sub: Subscription): void {
    this.subscriptions.push({ ...sub });
  }

  addWorkouts(workouts: ProgramWorkout[]): void {
    this.workouts.push(...workouts);
  }

  /** Bypasses the cooldown guard; for backfills and fixtures. */
  addLog(log: WorkoutLog): void {
    this.logs.push({ ...log });
  }

  allLogs(): WorkoutLog[] {
    return [...this.logs].sort(byLoggedAtThenId);
  }

  private latestSubscription(userId: string, statuses: SubscriptionStatus[]): Subscription | null {
    const matches = this.subscriptions
      .filter((s) => s.userId === userId && statuses.includes(s.status))
      .sort((a, b) => b.activatedAt.getTime() - a.activatedAt.getTime());
    return matches[0] ? { ...matches[0] } : null;
  }

  async getActiveSubscription(userId: string): Promise<Subscription | null> {
    return this.latestSubscription(userId, ["active"]);
  }

  async getSettleableSubscription(userId: string): Promise<Subscription | null> {
    return this.latestSubscription(userId, ["active", "completed"]);
  }

  async getLatestLog(userId: string): Promise<WorkoutLog | null> {
    const own = this.logs.filter((l) => l.userId === userId).sort(byLoggedAtThenId);
    const last = own[own.length - 1];
    return last ? { ...last } : null;
  }

  async listLogs(params: { subscriptionId: string; from: Date; to: Date }): Promise<WorkoutLog[]> {
    const from = params.from.getTime();
    const to = params.to.getTime();
    return this.logs
      .filter((l) => l.subscriptionId === params.subscriptionId && l.loggedAt.getTime() >= from && l.loggedAt.getTime() < to)
      .sort(byLoggedAtThenId);
  }

  async getProgramWorkout(programId: string, workoutId: string): Promise<ProgramWorkout | null> {
    return this.workouts.find((w) => w.programId === programId && w.id === workoutId) ?? null;
  }

  async listProgramWorkouts(params: { programId: string; weekNumber: number; variation: number }): Promise<ProgramWorkout[]> {
    return this.workouts
      .filter((w) => w.programId === params.programId && w.weekNumber === params.weekNumber && w.variation === params.variation)
      .sort((a, b) => a.dayNumber - b.dayNumber);
  }

  async appendLog(input: NewWorkoutLog): Promise<WorkoutLog | null> {
    const threshold = input.loggedAt.getTime() - input.cooldownMs;
    const blocked = this.logs.some((l) => l.userId === input.userId && l.loggedAt.getTime() > threshold);
    if (blocked) return null;
    const log: WorkoutLog = {
      id: crypto.randomUUID(),
      userId: input.userId,
      subscriptionId: input.subscriptionId,
      workoutId: input.workoutId,
      loggedAt: input.loggedAt,
      weekNumber: input.weekNumber
    };
    this.logs.push(log);
    return { ...log };
  }

  async updateSubscriptionStatus(id: string, status: SubscriptionStatus, _at: Date): Promise<void> {
    const sub = this.subscriptions.find((s) => s.id === id);
    if (sub) sub.status = status;
  }
}

const seedSchema = z.object({
  subscriptions: z.array(subscriptionRowSchema).default([]),
  program_workouts: z.array(programWorkoutRowSchema).default([]),
  workout_logs: z.array(workoutLogRowSchema).default([])
});

// Seed file uses the same snake_case rows as the database tables.
export function loadMemorySeed(filePath: string): MemoryStore {
  const raw: unknown = JSON.parse(fs.readFileSync(filePath, "utf8"));
  const seed = seedSchema.parse(raw);
  return new MemoryStore({
    subscriptions: seed.subscriptions.map(toSubscription),
    workouts: seed.program_workouts.map(toProgramWorkout),
    logs: seed.workout_logs.map(toWorkoutLog)
  });
}
