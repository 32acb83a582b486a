import { describe, it, expect } from "vitest";
import { evaluateCooldown } from "./cooldown.js";

const LAST = new Date("2024-01-01T10:00:00Z");
const minutesAfter = (m: number) => new Date(LAST.getTime() + m * 60_000);

describe("evaluateCooldown", () => {
  it("is never active without a previous log", () => {
    expect(evaluateCooldown(null, LAST)).toEqual({ active: false, unlocksAt: null, hoursRemaining: 0, skewMs: 0 });
  });

  it("reports the minutes left before the window lifts", () => {
    const w = evaluateCooldown(LAST, new Date("2024-01-02T03:59:00Z"));
    expect(w.active).toBe(true);
    expect(w.unlocksAt?.toISOString()).toBe("2024-01-02T04:00:00.000Z");
    expect(w.hoursRemaining).toBeCloseTo(1 / 60, 6);
    expect(w.skewMs).toBe(0);
  });

  it("is expired exactly at unlocksAt", () => {
    const w = evaluateCooldown(LAST, new Date("2024-01-02T04:00:00Z"));
    expect(w.active).toBe(false);
    expect(w.hoursRemaining).toBe(0);
    expect(w.unlocksAt?.toISOString()).toBe("2024-01-02T04:00:00.000Z");
  });

  it("is active for the full 18 hours starting at the log itself", () => {
    expect(evaluateCooldown(LAST, LAST).hoursRemaining).toBe(18);
    const cases: Array<[number, boolean]> = [
      [0, true],
      [1, true],
      [17 * 60 + 59, true],
      [18 * 60, false],
      [18 * 60 + 1, false],
      [48 * 60, false]
    ];
    for (const [minutes, active] of cases) {
      expect(evaluateCooldown(LAST, minutesAfter(minutes)).active).toBe(active);
    }
  });

  it("fails closed and widens the window when the last log is in the future", () => {
    const now = new Date("2024-01-01T08:00:00Z");
    const w = evaluateCooldown(LAST, now);
    expect(w.active).toBe(true);
    expect(w.skewMs).toBe(2 * 3_600_000);
    expect(w.unlocksAt?.toISOString()).toBe("2024-01-02T06:00:00.000Z");
    expect(w.hoursRemaining).toBe(22);
  });
});
