// src/modules/sessions/service.ts
// ============================================================================
// Session Manager (Business Logic)
// ----------------------------------------------------------------------------
// UseCases:
// - createSession:     Login abschließen (Refresh + Access ausstellen)
// - refreshSession:    Refresh-Rotation inkl. Reuse-Erkennung
// - revokeSession:     Session widerrufen + sid auf Denylist
// - listSessions:      eigene Sessions listen (ohne Token-Material)
// - revokeOwnSession:  Session des Users widerrufen (fremde → 404)
// ============================================================================

import { generateOpaqueToken, hashOpaqueToken } from "../../libs/crypto.js";
import { AuthenticationError, NotFoundError } from "../../libs/errors.js";
import type { DeviceMeta } from "../../libs/http.js";
import { signAccessToken } from "../../libs/jwt.js";
import {
  recordAuthRefreshReuseDetected,
  recordAuthRefreshSuccess,
} from "../../libs/metrics.js";
import type { AuthCache } from "../../libs/redis.js";
import type { UserRepository, UserRow } from "../identity/types.js";
import {
  toPublicSession,
  type DeviceType,
  type PublicSession,
  type RevokeReason,
  type SessionCredentials,
  type SessionPolicy,
  type SessionRepository,
  type SessionRow,
} from "./types.js";

type SessionStore = SessionRepository & UserRepository;

export function classifyDevice(userAgent: string | undefined | null): DeviceType {
  return userAgent?.includes("Mobile") ? "mobile" : "desktop";
}

async function credentialsFor(
  session: SessionRow,
  refreshToken: string,
  policy: SessionPolicy,
): Promise<SessionCredentials> {
  const access = await signAccessToken(session.user_id, session.id, policy.accessTtlSec);
  return {
    access_token: access.token,
    access_expires_at: new Date(access.exp * 1000).toISOString(),
    refresh_token: refreshToken,
    refresh_expires_at: session.refresh_expires_at.toISOString(),
    session_id: session.id,
    token_type: "bearer",
  };
}

function refreshExpiry(now: Date, absoluteExpiry: Date, policy: SessionPolicy): Date {
  const candidate = now.getTime() + policy.refreshTtlSec * 1000;
  return new Date(Math.min(candidate, absoluteExpiry.getTime()));
}

// ---------------------------------------------------------------------------
// createSession
// ---------------------------------------------------------------------------

export async function createSession(
  store: SessionStore,
  user: Pick<UserRow, "id">,
  meta: DeviceMeta,
  policy: SessionPolicy,
): Promise<SessionCredentials> {
  const now = new Date();
  const refreshToken = generateOpaqueToken();
  const expiresAt = new Date(now.getTime() + policy.absoluteTtlSec * 1000);

  const session = await store.insertSession({
    userId: user.id,
    refreshTokenHash: hashOpaqueToken(refreshToken),
    refreshExpiresAt: refreshExpiry(now, expiresAt, policy),
    expiresAt,
    ip: meta.ip ?? null,
    userAgent: meta.userAgent ?? null,
    deviceType: classifyDevice(meta.userAgent),
    createdAt: now,
  });

  await store.touchLastLogin(user.id, now);

  return credentialsFor(session, refreshToken, policy);
}

// ---------------------------------------------------------------------------
// revokeSession
// ---------------------------------------------------------------------------

export async function revokeSession(
  store: SessionRepository,
  cache: AuthCache,
  sessionId: string,
  reason: RevokeReason,
  policy: Pick<SessionPolicy, "accessTtlSec" | "clockSkewSec">,
): Promise<boolean> {
  const revoked = await store.revokeSessionRecord(sessionId, reason, new Date());
  // Denylist auch bei wiederholtem Revoke setzen (Redis-TTL kann abgelaufen sein).
  // Ein Access-Token gilt bis exp + Clock-Skew.
  await cache.denySession(sessionId, policy.accessTtlSec + policy.clockSkewSec);
  return revoked;
}

// ---------------------------------------------------------------------------
// refreshSession
// ---------------------------------------------------------------------------

export async function refreshSession(
  store: SessionStore,
  cache: AuthCache,
  rawRefreshToken: string,
  policy: SessionPolicy,
): Promise<SessionCredentials> {
  const presentedHash = hashOpaqueToken(rawRefreshToken.trim());
  const now = new Date();

  const session = await store.findSessionByRefreshHash(presentedHash);

  if (!session) {
    const reused = await store.findSessionByPreviousRefreshHash(presentedHash);
    if (reused) {
      await revokeSession(store, cache, reused.id, "refresh_reuse", policy);
      recordAuthRefreshReuseDetected();
      throw new AuthenticationError("refresh_reuse");
    }
    throw new AuthenticationError("refresh_unknown");
  }

  if (session.revoked_at) {
    throw new AuthenticationError("session_revoked");
  }

  if (
    session.refresh_expires_at.getTime() <= now.getTime() ||
    session.expires_at.getTime() <= now.getTime()
  ) {
    throw new AuthenticationError("refresh_expired");
  }

  const user = await store.findUserById(session.user_id);
  if (!user || !user.is_active) {
    throw new AuthenticationError("user_inactive");
  }

  const nextToken = generateOpaqueToken();
  const rotated = await store.rotateRefreshToken({
    sessionId: session.id,
    expectedHash: presentedHash,
    nextHash: hashOpaqueToken(nextToken),
    refreshExpiresAt: refreshExpiry(now, session.expires_at, policy),
    now,
  });

  if (!rotated) {
    // Paralleler Refresh mit demselben Token hat gewonnen
    throw new AuthenticationError("refresh_rotated");
  }

  recordAuthRefreshSuccess();
  return credentialsFor(rotated, nextToken, policy);
}

// ---------------------------------------------------------------------------
// Session-Status für strictSession-Routen
// ---------------------------------------------------------------------------

export async function assertSessionActive(
  store: SessionRepository,
  sessionId: string,
  userId: string,
): Promise<SessionRow> {
  const session = await store.findSessionById(sessionId);
  if (!session || session.user_id !== userId) {
    throw new AuthenticationError("session_unknown");
  }
  if (session.revoked_at) {
    throw new AuthenticationError("session_revoked");
  }
  if (session.expires_at.getTime() <= Date.now()) {
    throw new AuthenticationError("session_expired");
  }
  return session;
}

// ---------------------------------------------------------------------------
// Eigene Sessions
// ---------------------------------------------------------------------------

export async function listSessions(
  store: SessionRepository,
  input: { userId: string; currentSessionId?: string; limit?: number },
): Promise<PublicSession[]> {
  const requested = input.limit ?? 20;
  const limit = Math.min(Math.max(requested, 1), 100);
  const rows = await store.listSessionsByUserId(input.userId, limit);
  return rows.map((row) => toPublicSession(row, input.currentSessionId));
}

export async function revokeOwnSession(
  store: SessionRepository,
  cache: AuthCache,
  input: { userId: string; sessionId: string },
  policy: Pick<SessionPolicy, "accessTtlSec" | "clockSkewSec">,
): Promise<{ revoked: boolean }> {
  const session = await store.findSessionById(input.sessionId);
  if (!session || session.user_id !== input.userId) {
    throw new NotFoundError("Session not found.");
  }
  const revoked = await revokeSession(store, cache, session.id, "user_revoked", policy);
  return { revoked };
}
