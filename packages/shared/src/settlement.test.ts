import { describe, it, expect } from "vitest";
import { computeSettlement, settledStatus } from "./settlement.js";

const SUB = {
  activatedAt: new Date("2024-01-01T00:00:00Z"),
  programLengthWeeks: 12,
  pledgeAmount: 80,
  currency: "usd"
};

describe("computeSettlement", () => {
  it("is pending while the program runs", () => {
    const s = computeSettlement(SUB, { refundEligible: true }, new Date("2024-03-24T23:59:59Z"));
    expect(s.outcome).toBe("pending");
    expect(s.refundAmount).toBe(0);
    expect(s.programEndsAt.toISOString()).toBe("2024-03-25T00:00:00.000Z");
  });

  it("refunds the full pledge when eligibility held", () => {
    const s = computeSettlement(SUB, { refundEligible: true }, new Date("2024-03-25T00:00:00Z"));
    expect(s).toMatchObject({ outcome: "refund", refundAmount: 80, currency: "usd" });
  });

  it("forfeits the pledge when eligibility was lost", () => {
    const s = computeSettlement(SUB, { refundEligible: false }, new Date("2024-04-01T00:00:00Z"));
    expect(s).toMatchObject({ outcome: "forfeit", refundAmount: 0 });
  });
});

describe("settledStatus", () => {
  it("maps outcomes to final subscription statuses", () => {
    expect(settledStatus("refund")).toBe("refunded");
    expect(settledStatus("forfeit")).toBe("forfeited");
    expect(settledStatus("pending")).toBeNull();
  });
});
