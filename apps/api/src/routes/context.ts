import type { Clock } from "@skinin/shared";
import type { ResolveUser } from "../auth.js";
import type { AdherenceEngine } from "../services/engine.js";

export type RouteContext = {
  engine: AdherenceEngine;
  resolveUser: ResolveUser;
  clock: Clock;
  adminToken?: string | undefined;
};

export function errorBody(message: string, code: string, details?: Record<string, unknown>) {
  return { error: message, code, ...(details ?? {}) };
}

export const NOT_SUBSCRIBED_MESSAGE = "No active subscription found.";
