import { DAY_MS, HOUR_MS, WEEK_MS, type ProgramWorkout, type Subscription } from "@skinin/shared";
import { MemoryStore } from "../store/memory.js";

export const ACTIVATED = new Date("2024-01-01T00:00:00Z");
export const USER = "user-1";

export const SUBSCRIPTION: Subscription = {
  id: "sub-1",
  userId: USER,
  programId: "program-1",
  variation: 2,
  activatedAt: ACTIVATED,
  programLengthWeeks: 12,
  requiredWorkoutsPerWeek: 4,
  pledgeAmount: 80,
  currency: "usd",
  status: "active"
};

export function programWorkouts(weeks = 12): ProgramWorkout[] {
  const out: ProgramWorkout[] = [];
  for (let week = 1; week <= weeks; week++) {
    for (let day = 1; day <= 4; day++) {
      out.push({
        id: `w${week}-d${day}`,
        programId: "program-1",
        weekNumber: week,
        dayNumber: day,
        variation: 2,
        title: `Week ${week} Day ${day}`,
        description: `Session ${day}`
      });
    }
  }
  // same slot, other variation: must never show up for this subscription
  out.push({
    id: "v1-w1-d1",
    programId: "program-1",
    weekNumber: 1,
    dayNumber: 1,
    variation: 1,
    title: "Other variation",
    description: ""
  });
  return out;
}

export function seededStore(): MemoryStore {
  return new MemoryStore({ subscriptions: [{ ...SUBSCRIPTION }], workouts: programWorkouts() });
}

let seq = 0;

/** Adds a log directly, skipping the cooldown guard. */
export function addLogAt(store: MemoryStore, loggedAt: Date, workoutId = "w1-d1", weekNumber = 1): void {
  seq += 1;
  store.addLog({
    id: `log-${String(seq).padStart(4, "0")}`,
    userId: USER,
    subscriptionId: SUBSCRIPTION.id,
    workoutId,
    loggedAt,
    weekNumber
  });
}

// Day `day` (0-based) of program week `week`, at `hour` UTC.
export function programTime(week: number, day: number, hour = 10): Date {
  return new Date(ACTIVATED.getTime() + (week - 1) * WEEK_MS + day * DAY_MS + hour * HOUR_MS);
}
