import { describe, it, expect } from "vitest";
import { closedWeekCount, currentWeek, programEndsAt, weekWindow } from "./programClock.js";

const ACTIVATED = new Date("2024-01-01T00:00:00Z");

describe("currentWeek", () => {
  it("starts week 2 exactly seven days after activation", () => {
    const w = currentWeek(ACTIVATED, new Date("2024-01-08T00:00:00Z"));
    expect(w.weekNumber).toBe(2);
    expect(w.weekStartsAt.toISOString()).toBe("2024-01-08T00:00:00.000Z");
    expect(w.weekEndsAt.toISOString()).toBe("2024-01-15T00:00:00.000Z");
    expect(w.skewMs).toBe(0);
  });

  it("stays in week 1 until the last minute of day 7", () => {
    const w = currentWeek(ACTIVATED, new Date("2024-01-07T23:59:00Z"));
    expect(w.weekNumber).toBe(1);
    expect(w.weekEndsAt.toISOString()).toBe("2024-01-08T00:00:00.000Z");
  });

  it("clamps at week 12 after the program is over", () => {
    const w = currentWeek(ACTIVATED, new Date("2024-06-01T00:00:00Z"));
    expect(w.weekNumber).toBe(12);
    expect(w.weekEndsAt.toISOString()).toBe("2024-03-25T00:00:00.000Z");
  });

  it("clamps to week 1 and reports skew before activation", () => {
    const w = currentWeek(ACTIVATED, new Date("2023-12-31T23:00:00Z"));
    expect(w.weekNumber).toBe(1);
    expect(w.skewMs).toBe(3_600_000);
    expect(w.weekEndsAt.toISOString()).toBe("2024-01-08T00:00:00.000Z");
  });

  it("returns the same answer for the same inputs", () => {
    const now = new Date("2024-02-13T17:42:10Z");
    expect(currentWeek(ACTIVATED, now)).toEqual(currentWeek(ACTIVATED, now));
  });
});

describe("weekWindow", () => {
  it("gives contiguous seven-day windows", () => {
    const w3 = weekWindow(ACTIVATED, 3);
    const w4 = weekWindow(ACTIVATED, 4);
    expect(w3.weekStartsAt.toISOString()).toBe("2024-01-15T00:00:00.000Z");
    expect(w3.weekEndsAt.getTime()).toBe(w4.weekStartsAt.getTime());
  });
});

describe("closedWeekCount", () => {
  it("counts only fully elapsed weeks", () => {
    expect(closedWeekCount(ACTIVATED, new Date("2023-12-25T00:00:00Z"))).toBe(0);
    expect(closedWeekCount(ACTIVATED, new Date("2024-01-07T23:59:59Z"))).toBe(0);
    expect(closedWeekCount(ACTIVATED, new Date("2024-01-08T00:00:00Z"))).toBe(1);
    expect(closedWeekCount(ACTIVATED, new Date("2025-01-01T00:00:00Z"))).toBe(12);
  });
});

describe("programEndsAt", () => {
  it("is twelve weeks after activation", () => {
    expect(programEndsAt(ACTIVATED).toISOString()).toBe("2024-03-25T00:00:00.000Z");
  });
});
