import { programEndsAt } from "./programClock.js";
import type { EligibilityState, Settlement, Subscription, SubscriptionStatus } from "./types.js";

export function computeSettlement(
  subscription: Pick<Subscription, "activatedAt" | "programLengthWeeks" | "pledgeAmount" | "currency">,
  eligibility: Pick<EligibilityState, "refundEligible">,
  now: Date
): Settlement {
  const endsAt = programEndsAt(subscription.activatedAt, subscription.programLengthWeeks);
  const base = { currency: subscription.currency, programEndsAt: endsAt };
  if (now.getTime() < endsAt.getTime()) return { ...base, outcome: "pending", refundAmount: 0 };
  if (eligibility.refundEligible) return { ...base, outcome: "refund", refundAmount: subscription.pledgeAmount };
  return { ...base, outcome: "forfeit", refundAmount: 0 };
}

export function settledStatus(outcome: Settlement["outcome"]): SubscriptionStatus | null {
  if (outcome === "refund") return "refunded";
  if (outcome === "forfeit") return "forfeited";
  return null;
}
