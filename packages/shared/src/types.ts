// Shared domain types. Table rows are validated and mapped in apps/api/src/store/rows.ts.

export type SubscriptionStatus = "active" | "completed" | "refunded" | "forfeited";
export type WorkoutStatus = "completed" | "next" | "locked";
export type WeekOutcome = "met" | "missed_graced" | "missed_penalized";

export interface Subscription {
  id: string;
  userId: string;
  programId: string;
  variation: number;
  activatedAt: Date;
  programLengthWeeks: number;
  requiredWorkoutsPerWeek: number;
  pledgeAmount: number;
  currency: string;
  status: SubscriptionStatus;
}

export interface WorkoutLog {
  id: string;
  userId: string;
  subscriptionId: string;
  workoutId: string;
  loggedAt: Date;
  /** Cached for queries; the program clock is the source of truth. */
  weekNumber: number;
}

export interface ProgramWorkout {
  id: string;
  programId: string;
  weekNumber: number;
  dayNumber: number;
  variation: number;
  title: string;
  description: string;
}

export interface CooldownWindow {
  active: boolean;
  unlocksAt: Date | null;
  hoursRemaining: number;
  /** How far the last log sits in the future of `now`; 0 when the clocks agree. */
  skewMs: number;
}

export interface ProgramWeek {
  weekNumber: number;
  weekStartsAt: Date;
  weekEndsAt: Date;
  skewMs: number;
}

export interface WeekRecord {
  weekNumber: number;
  windowStart: Date;
  windowEnd: Date;
  completedCount: number;
  required: number;
  graceDayUsed: boolean;
  metRequirement: boolean;
  /** False for the week still in progress. */
  closed: boolean;
}

export interface EvaluatedWeek extends WeekRecord {
  outcome: WeekOutcome;
}

export interface EligibilityState {
  refundEligible: boolean;
  graceWeeksRemaining: number;
  consecutiveMisses: number;
  lostAtWeek: number | null;
  weeks: EvaluatedWeek[];
}

export type SettlementOutcome = "pending" | "refund" | "forfeit";

export interface Settlement {
  outcome: SettlementOutcome;
  refundAmount: number;
  currency: string;
  programEndsAt: Date;
}
