import type { FastifyBaseLogger } from "fastify";
import {
  COOLDOWN_MS,
  type CooldownWindow,
  type EligibilityState,
  type ProgramWeek,
  type Settlement,
  type Subscription,
  type WeekRecord,
  type WorkoutLog,
  type WorkoutStatus,
  closedWeekCount,
  computeSettlement,
  currentWeek,
  evaluateAdherence,
  evaluateCooldown,
  programEndsAt,
  settledStatus,
  toIsoDateUTC,
  weekWindow
} from "@skinin/shared";
import type { AdherenceStore } from "../store/types.js";
import { UserLock } from "./userLock.js";

export type EngineLogger = Pick<FastifyBaseLogger, "info" | "warn">;

export type WorkoutLogResult =
  | { ok: true; log: WorkoutLog; cooldown: CooldownWindow }
  | { ok: false; error: "cooldown_active"; unlocksAt: Date; hoursRemaining: number }
  | { ok: false; error: "not_subscribed" }
  | { ok: false; error: "workout_not_found" }
  | { ok: false; error: "program_ended"; programEndsAt: Date };

export type WeekWorkoutView = {
  id: string;
  title: string;
  description: string;
  dayNumber: number;
  status: WorkoutStatus;
  loggedDate: string | null;
};

export type WeekStatusView = {
  weekNumber: number;
  variation: number;
  weekStartsAt: Date;
  weekEndsAt: Date;
  cooldown: CooldownWindow;
  amountPaid: number;
  currency: string;
  workouts: WeekWorkoutView[];
};

export type EligibilityView = EligibilityState & {
  currentWeek: ProgramWeek;
  requiredPerWeek: number;
  /** The in-progress week, shown but not evaluated. */
  openWeek: WeekRecord | null;
};

export type NotSubscribed = { ok: false; error: "not_subscribed" };

export type SettlementResult =
  | { ok: true; settlement: Settlement; status: Subscription["status"] }
  | NotSubscribed
  | { ok: false; error: "program_in_progress"; settlement: Settlement };

const NOT_SUBSCRIBED: NotSubscribed = { ok: false, error: "not_subscribed" };

/**
 * Builds per-workout statuses: completed when a matching log sits in the week,
 * the first remaining one in day order is next, the rest are locked.
 */
export function workoutStatuses(
  workouts: ReadonlyArray<{ id: string; title: string; description: string; dayNumber: number }>,
  logs: readonly WorkoutLog[]
): WeekWorkoutView[] {
  const loggedAt = new Map<string, Date>();
  for (const l of logs) {
    if (!loggedAt.has(l.workoutId)) loggedAt.set(l.workoutId, l.loggedAt);
  }
  let nextAssigned = false;
  return [...workouts]
    .sort((a, b) => a.dayNumber - b.dayNumber)
    .map((w) => {
      const at = loggedAt.get(w.id);
      let status: WorkoutStatus;
      if (at) status = "completed";
      else if (!nextAssigned) {
        status = "next";
        nextAssigned = true;
      } else status = "locked";
      return {
        id: w.id,
        title: w.title,
        description: w.description,
        dayNumber: w.dayNumber,
        status,
        loggedDate: at ? toIsoDateUTC(at) : null
      };
    });
}

export function createAdherenceEngine(deps: { store: AdherenceStore; logger: EngineLogger; lock?: UserLock }) {
  const { store, logger } = deps;
  const lock = deps.lock ?? new UserLock();

  function cooldownFor(userId: string, lastLog: WorkoutLog | null, now: Date): CooldownWindow {
    const window = evaluateCooldown(lastLog?.loggedAt ?? null, now);
    if (window.skewMs > 0) {
      logger.warn(
        { event: "clock_skew_detected", userId, logId: lastLog?.id, skewMs: window.skewMs },
        "latest workout log is in the future; cooldown widened"
      );
    }
    return window;
  }

  function weekFor(sub: Subscription, now: Date): ProgramWeek {
    const week = currentWeek(sub.activatedAt, now, sub.programLengthWeeks);
    if (week.skewMs > 0) {
      logger.warn(
        { event: "clock_skew_detected", userId: sub.userId, subscriptionId: sub.id, skewMs: week.skewMs },
        "subscription activation is in the future; using week 1"
      );
    }
    return week;
  }

  async function buildHistory(sub: Subscription, now: Date): Promise<{ closed: WeekRecord[]; open: WeekRecord | null }> {
    const closedCount = closedWeekCount(sub.activatedAt, now, sub.programLengthWeeks);
    const hasOpenWeek = closedCount < sub.programLengthWeeks && now.getTime() >= sub.activatedAt.getTime();
    const lastWeek = hasOpenWeek ? closedCount + 1 : closedCount;
    if (lastWeek === 0) return { closed: [], open: null };

    const logs = await store.listLogs({
      subscriptionId: sub.id,
      from: sub.activatedAt,
      to: weekWindow(sub.activatedAt, lastWeek).weekEndsAt
    });

    // Ids are unique per row; a repeated id means the same row was read twice.
    const seen = new Set<string>();
    const counts = new Map<number, number>();
    for (const log of logs) {
      if (seen.has(log.id)) continue;
      seen.add(log.id);
      // Bucket by the program clock, not the cached week_number.
      const n = currentWeek(sub.activatedAt, log.loggedAt, sub.programLengthWeeks).weekNumber;
      counts.set(n, (counts.get(n) ?? 0) + 1);
    }

    const records: WeekRecord[] = [];
    for (let n = 1; n <= lastWeek; n++) {
      const { weekStartsAt, weekEndsAt } = weekWindow(sub.activatedAt, n);
      const completedCount = counts.get(n) ?? 0;
      records.push({
        weekNumber: n,
        windowStart: weekStartsAt,
        windowEnd: weekEndsAt,
        completedCount,
        required: sub.requiredWorkoutsPerWeek,
        graceDayUsed: false,
        metRequirement: completedCount >= sub.requiredWorkoutsPerWeek,
        closed: n <= closedCount
      });
    }
    return {
      closed: records.filter((r) => r.closed),
      open: records.find((r) => !r.closed) ?? null
    };
  }

  async function computeEligibility(sub: Subscription, now: Date): Promise<EligibilityView> {
    const week = weekFor(sub, now);
    const history = await buildHistory(sub, now);
    const state = evaluateAdherence(history.closed, sub.requiredWorkoutsPerWeek, {
      programLengthWeeks: sub.programLengthWeeks
    });
    return { ...state, currentWeek: week, requiredPerWeek: sub.requiredWorkoutsPerWeek, openWeek: history.open };
  }

  return {
    /** The only write path for workout logs; `loggedAt` is always the server's `now`. */
    async requestWorkoutLog(userId: string, workoutId: string, now: Date): Promise<WorkoutLogResult> {
      return lock.run(userId, async () => {
        const sub = await store.getActiveSubscription(userId);
        if (!sub) return NOT_SUBSCRIBED;

        // Past the last week nothing can count any more; the subscription waits for settlement.
        const endsAt = programEndsAt(sub.activatedAt, sub.programLengthWeeks);
        if (now.getTime() >= endsAt.getTime()) {
          await store.updateSubscriptionStatus(sub.id, "completed", now);
          logger.info({ event: "program_completed", userId, subscriptionId: sub.id }, "program ended; awaiting settlement");
          return { ok: false, error: "program_ended", programEndsAt: endsAt };
        }

        const workout = await store.getProgramWorkout(sub.programId, workoutId);
        if (!workout) return { ok: false, error: "workout_not_found" };

        const lastLog = await store.getLatestLog(userId);
        const window = cooldownFor(userId, lastLog, now);
        if (window.active && window.unlocksAt) {
          return { ok: false, error: "cooldown_active", unlocksAt: window.unlocksAt, hoursRemaining: window.hoursRemaining };
        }

        const week = weekFor(sub, now);
        const log = await store.appendLog({
          userId,
          subscriptionId: sub.id,
          workoutId: workout.id,
          loggedAt: now,
          weekNumber: week.weekNumber,
          cooldownMs: COOLDOWN_MS
        });
        if (!log) {
          // Another process inserted first.
          const latest = await store.getLatestLog(userId);
          const current = evaluateCooldown(latest?.loggedAt ?? now, now);
          return {
            ok: false,
            error: "cooldown_active",
            unlocksAt: current.unlocksAt ?? now,
            hoursRemaining: current.hoursRemaining
          };
        }

        logger.info({ event: "workout_logged", userId, workoutId: log.workoutId, weekNumber: log.weekNumber }, "workout logged");
        return { ok: true, log, cooldown: evaluateCooldown(log.loggedAt, now) };
      });
    },

    async getCooldownStatus(userId: string, now: Date): Promise<CooldownWindow> {
      const lastLog = await store.getLatestLog(userId);
      return cooldownFor(userId, lastLog, now);
    },

    async getCurrentWeekStatus(userId: string, now: Date): Promise<{ ok: true; view: WeekStatusView } | NotSubscribed> {
      const sub = await store.getActiveSubscription(userId);
      if (!sub) return NOT_SUBSCRIBED;

      const week = weekFor(sub, now);
      const [workouts, logs, lastLog] = await Promise.all([
        store.listProgramWorkouts({ programId: sub.programId, weekNumber: week.weekNumber, variation: sub.variation }),
        store.listLogs({ subscriptionId: sub.id, from: week.weekStartsAt, to: week.weekEndsAt }),
        store.getLatestLog(userId)
      ]);

      return {
        ok: true,
        view: {
          weekNumber: week.weekNumber,
          variation: sub.variation,
          weekStartsAt: week.weekStartsAt,
          weekEndsAt: week.weekEndsAt,
          cooldown: cooldownFor(userId, lastLog, now),
          amountPaid: sub.pledgeAmount,
          currency: sub.currency,
          workouts: workoutStatuses(workouts, logs)
        }
      };
    },

    async getEligibility(userId: string, now: Date): Promise<{ ok: true; eligibility: EligibilityView } | NotSubscribed> {
      // Also answers for a completed program until it is settled.
      const sub = await store.getSettleableSubscription(userId);
      if (!sub) return NOT_SUBSCRIBED;
      return { ok: true, eligibility: await computeEligibility(sub, now) };
    },

    async settle(userId: string, now: Date): Promise<SettlementResult> {
      return lock.run(userId, async () => {
        const sub = await store.getSettleableSubscription(userId);
        if (!sub) return NOT_SUBSCRIBED;

        const eligibility = await computeEligibility(sub, now);
        const settlement = computeSettlement(sub, eligibility, now);
        const status = settledStatus(settlement.outcome);
        if (!status) return { ok: false, error: "program_in_progress", settlement };

        await store.updateSubscriptionStatus(sub.id, status, now);
        logger.info(
          { event: "subscription_settled", userId, subscriptionId: sub.id, outcome: settlement.outcome, refundAmount: settlement.refundAmount },
          "subscription settled"
        );
        return { ok: true, settlement, status };
      });
    }
  };
}

export type AdherenceEngine = ReturnType<typeof createAdherenceEngine>;
