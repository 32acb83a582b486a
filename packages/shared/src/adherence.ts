import { GRACE_WEEKS_PER_PROGRAM, PENALIZED_MISSES_TO_LOSE, PROGRAM_LENGTH_WEEKS } from "./time.js";
import type { EligibilityState, EvaluatedWeek, WeekOutcome, WeekRecord } from "./types.js";

export type AdherenceRules = {
  graceWeeks: number;
  missesToLose: number;
  programLengthWeeks: number;
};

const DEFAULT_RULES: AdherenceRules = {
  graceWeeks: GRACE_WEEKS_PER_PROGRAM,
  missesToLose: PENALIZED_MISSES_TO_LOSE,
  programLengthWeeks: PROGRAM_LENGTH_WEEKS
};

function safeCount(n: number): number {
  return Number.isFinite(n) && n > 0 ? Math.floor(n) : 0;
}

// Sorted by week number, one record per week inside 1..programLengthWeeks, counts clamped to >= 0.
export function normalizeHistory(history: readonly WeekRecord[], programLengthWeeks = PROGRAM_LENGTH_WEEKS): WeekRecord[] {
  const sorted = history
    .filter((w) => Number.isInteger(w.weekNumber) && w.weekNumber >= 1 && w.weekNumber <= programLengthWeeks)
    .map((w, idx) => ({ w, idx }))
    .sort((a, b) => a.w.weekNumber - b.w.weekNumber || a.idx - b.idx)
    .map(({ w }) => ({ ...w, completedCount: safeCount(w.completedCount) }));

  const seen = new Set<number>();
  const out: WeekRecord[] = [];
  for (const w of sorted) {
    if (seen.has(w.weekNumber)) continue;
    seen.add(w.weekNumber);
    out.push(w);
  }
  return out;
}

/**
 * Replays closed weeks in order and derives refund eligibility.
 *
 * One grace week per program absorbs the first miss and resets the consecutive counter.
 * After that, two misses in a row lose eligibility for good; later weeks are not evaluated.
 * Open weeks are returned untouched and never count as misses.
 */
export function evaluateAdherence(
  history: readonly WeekRecord[],
  requiredPerWeek: number,
  overrides: Partial<AdherenceRules> = {}
): EligibilityState {
  const rules: AdherenceRules = { ...DEFAULT_RULES, ...overrides };
  const required = safeCount(requiredPerWeek);
  let graceWeeksRemaining = rules.graceWeeks;
  let consecutiveMisses = 0;
  let refundEligible = true;
  let lostAtWeek: number | null = null;
  const weeks: EvaluatedWeek[] = [];

  for (const week of normalizeHistory(history, rules.programLengthWeeks)) {
    if (!week.closed) continue;

    const metRequirement = week.completedCount >= required;
    let outcome: WeekOutcome;
    let graceDayUsed = false;
    if (metRequirement) {
      outcome = "met";
      consecutiveMisses = 0;
    } else if (graceWeeksRemaining > 0) {
      graceWeeksRemaining -= 1;
      graceDayUsed = true;
      outcome = "missed_graced";
      consecutiveMisses = 0;
    } else {
      outcome = "missed_penalized";
      consecutiveMisses += 1;
    }
    weeks.push({ ...week, required, metRequirement, graceDayUsed, outcome });

    if (consecutiveMisses >= rules.missesToLose) {
      refundEligible = false;
      lostAtWeek = week.weekNumber;
      break;
    }
  }

  return { refundEligible, graceWeeksRemaining, consecutiveMisses, lostAtWeek, weeks };
}
