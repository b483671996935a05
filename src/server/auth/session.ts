/**
 * Session Lookup
 *
 * Sessions are created elsewhere; this service only resolves a bearer token
 * to the user it belongs to. Tokens are stored as SHA-256 hashes, never raw.
 */

import crypto from "crypto";
import type { ReaderStore } from "@/server/entries/query";

export interface SessionData {
  sessionId: string;
  userId: string;
}

/**
 * Hashes a session token using SHA-256.
 */
export function hashToken(token: string): string {
  return crypto.createHash("sha256").update(token).digest("hex");
}

/**
 * Resolves a raw session token.
 * Returns null for unknown, expired and revoked sessions.
 */
export async function validateSession(
  store: ReaderStore,
  token: string,
  now: Date = new Date()
): Promise<SessionData | null> {
  const session = await store.findSession(hashToken(token));

  if (!session || session.revokedAt !== null || session.expiresAt <= now) {
    return null;
  }

  return { sessionId: session.id, userId: session.userId };
}
