import { COOLDOWN_MS, addMs, msToHours } from "./time.js";
import type { CooldownWindow } from "./types.js";

/**
 * Whether a new workout log is blocked at `now`, given the user's most recent log.
 *
 * Active on `[lastLogAt, lastLogAt + 18h)`. A `lastLogAt` later than `now` is treated
 * as clock skew: the window stays active and is pushed out by the skew.
 */
export function evaluateCooldown(lastLogAt: Date | null, now: Date, cooldownMs = COOLDOWN_MS): CooldownWindow {
  if (!lastLogAt) return { active: false, unlocksAt: null, hoursRemaining: 0, skewMs: 0 };

  const skewMs = Math.max(0, lastLogAt.getTime() - now.getTime());
  const unlocksAt = addMs(lastLogAt, cooldownMs + skewMs);
  const remainingMs = unlocksAt.getTime() - now.getTime();
  // strict: at exactly unlocksAt the cooldown is over
  const active = remainingMs > 0;
  return {
    active,
    unlocksAt,
    hoursRemaining: active ? msToHours(remainingMs) : 0,
    skewMs
  };
}
