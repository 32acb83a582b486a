import { DAY_MS, PROGRAM_LENGTH_WEEKS, WEEK_MS, addMs } from "./time.js";
import type { ProgramWeek } from "./types.js";

/**
 * Maps time since activation to the program week.
 * Weeks are anchored on `activatedAt` only and clamp at the last week.
 */
export function currentWeek(activatedAt: Date, now: Date, programLengthWeeks = PROGRAM_LENGTH_WEEKS): ProgramWeek {
  const elapsedMs = now.getTime() - activatedAt.getTime();
  if (elapsedMs < 0) {
    return { ...weekWindow(activatedAt, 1), weekNumber: 1, skewMs: -elapsedMs };
  }
  const elapsedDays = Math.floor(elapsedMs / DAY_MS);
  const weekNumber = Math.min(programLengthWeeks, Math.floor(elapsedDays / 7) + 1);
  return { ...weekWindow(activatedAt, weekNumber), weekNumber, skewMs: 0 };
}

// [weekStartsAt, weekEndsAt) of a program week.
export function weekWindow(activatedAt: Date, weekNumber: number): { weekStartsAt: Date; weekEndsAt: Date } {
  return {
    weekStartsAt: addMs(activatedAt, (weekNumber - 1) * WEEK_MS),
    weekEndsAt: addMs(activatedAt, weekNumber * WEEK_MS)
  };
}

export function closedWeekCount(activatedAt: Date, now: Date, programLengthWeeks = PROGRAM_LENGTH_WEEKS): number {
  const elapsedMs = now.getTime() - activatedAt.getTime();
  if (elapsedMs <= 0) return 0;
  return Math.min(programLengthWeeks, Math.floor(elapsedMs / WEEK_MS));
}

export function programEndsAt(activatedAt: Date, programLengthWeeks = PROGRAM_LENGTH_WEEKS): Date {
  return addMs(activatedAt, programLengthWeeks * WEEK_MS);
}
