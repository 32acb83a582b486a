export const HOUR_MS = 3_600_000;
export const DAY_MS = 86_400_000;
export const WEEK_MS = 7 * DAY_MS;

export const COOLDOWN_HOURS = 18;
export const COOLDOWN_MS = COOLDOWN_HOURS * HOUR_MS;
export const PROGRAM_LENGTH_WEEKS = 12;
export const GRACE_WEEKS_PER_PROGRAM = 1;
export const PENALIZED_MISSES_TO_LOSE = 2;

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

export function addMs(date: Date, ms: number): Date {
  return new Date(date.getTime() + ms);
}

export function msToHours(ms: number): number {
  return ms / HOUR_MS;
}

// "yyyy-MM-dd" in UTC, the format the client parses for logged dates.
export function toIsoDateUTC(d: Date): string {
  return `${d.getUTCFullYear()}-${String(d.getUTCMonth() + 1).padStart(2, "0")}-${String(d.getUTCDate()).padStart(2, "0")}`;
}
