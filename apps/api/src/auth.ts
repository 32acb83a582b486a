import { timingSafeEqual } from "node:crypto";
import type { FastifyRequest } from "fastify";
import type { SupabaseClient } from "@supabase/supabase-js";
import { z } from "zod";
import { AuthenticationError } from "./errors.js";

/** Maps a bearer token to a user id, or null when the token is not accepted. */
export type ResolveUser = (token: string) => Promise<string | null>;

export function bearerToken(request: FastifyRequest): string | null {
  const authHeader = request.headers["authorization"];
  if (!authHeader?.startsWith("Bearer ")) return null;
  const token = authHeader.slice("Bearer ".length).trim();
  return token || null;
}

export async function requireUser(request: FastifyRequest, resolveUser: ResolveUser): Promise<string> {
  const token = bearerToken(request);
  if (!token) throw new AuthenticationError();
  const userId = await resolveUser(token);
  if (!userId) throw new AuthenticationError();
  return userId;
}

export function supabaseUserResolver(db: SupabaseClient): ResolveUser {
  return async (token) => {
    const { data, error } = await db.auth.getUser(token);
    if (error || !data.user) return null;
    return data.user.id;
  };
}

const claimsSchema = z.object({ sub: z.string().min(1) });

/**
 * Reads the `sub` claim without checking the signature.
 * Only for deployments where a gateway in front of the API has already verified the JWT.
 */
export function claimsUserResolver(): ResolveUser {
  return async (token) => {
    const payload = token.split(".")[1];
    if (!payload) return null;
    try {
      const json: unknown = JSON.parse(Buffer.from(payload, "base64url").toString("utf8"));
      const parsed = claimsSchema.safeParse(json);
      return parsed.success ? parsed.data.sub : null;
    } catch {
      return null;
    }
  };
}

export function tokensMatch(given: string, expected: string): boolean {
  const a = Buffer.from(given, "utf8");
  const b = Buffer.from(expected, "utf8");
  return a.length === b.length && timingSafeEqual(a, b);
}

export function requireAdminToken(request: FastifyRequest, adminToken: string | undefined): void {
  if (!adminToken) throw new AuthenticationError("Admin token is not configured");
  const header = request.headers["x-admin-token"];
  if (typeof header !== "string" || !tokensMatch(header, adminToken)) throw new AuthenticationError();
}
