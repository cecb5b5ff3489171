// src/modules/sessions/types.ts
// ============================================================================
// Typen für Session-Management
// ----------------------------------------------------------------------------
// - Intern: SessionRow (DB-Level, auth.user_sessions)
// - Extern: PublicSession / SessionCredentials für API-Responses
// ============================================================================

export type DeviceType = "mobile" | "desktop";

export type RevokeReason = "logout" | "user_revoked" | "refresh_reuse" | "admin";

export interface SessionRow {
  id: string;
  user_id: string;
  refresh_token_hash: string;
  previous_refresh_token_hash: string | null;
  refresh_expires_at: Date;
  expires_at: Date;
  ip: string | null;
  user_agent: string | null;
  device_type: DeviceType;
  created_at: Date;
  last_seen_at: Date;
  revoked_at: Date | null;
  revoke_reason: string | null;
}

export interface NewSession {
  userId: string;
  refreshTokenHash: string;
  refreshExpiresAt: Date;
  expiresAt: Date;
  ip: string | null;
  userAgent: string | null;
  deviceType: DeviceType;
  createdAt: Date;
}

export interface RotateRefreshInput {
  sessionId: string;
  expectedHash: string;
  nextHash: string;
  refreshExpiresAt: Date;
  now: Date;
}

export interface SessionRepository {
  insertSession(input: NewSession): Promise<SessionRow>;
  findSessionById(id: string): Promise<SessionRow | null>;
  findSessionByRefreshHash(hash: string): Promise<SessionRow | null>;
  findSessionByPreviousRefreshHash(hash: string): Promise<SessionRow | null>;
  /** Compare-and-update auf den alten Hash; null → parallel rotiert. */
  rotateRefreshToken(input: RotateRefreshInput): Promise<SessionRow | null>;
  /** Setzt revoked_at nur einmal; true wenn diese Operation widerrufen hat. */
  revokeSessionRecord(id: string, reason: RevokeReason, now: Date): Promise<boolean>;
  listSessionsByUserId(userId: string, limit: number): Promise<SessionRow[]>;
}

export type SessionPolicy = {
  accessTtlSec: number;
  refreshTtlSec: number;
  absoluteTtlSec: number;
  /** Toleranz von verifyAccessToken; Denylist muss exp + Skew abdecken */
  clockSkewSec: number;
};

// ---------------------------------------------------------------------------
// Öffentliche Typen
// ---------------------------------------------------------------------------

export interface SessionCredentials {
  access_token: string;
  access_expires_at: string;
  refresh_token: string;
  refresh_expires_at: string;
  session_id: string;
  token_type: "bearer";
}

export interface PublicSession {
  id: string;
  deviceType: DeviceType;
  userAgent: string | null;
  createdAt: Date;
  lastSeenAt: Date;
  expiresAt: Date;
  revokedAt: Date | null;
  current: boolean;
}

export function toPublicSession(row: SessionRow, currentSessionId?: string): PublicSession {
  return {
    id: row.id,
    deviceType: row.device_type,
    userAgent: row.user_agent,
    createdAt: row.created_at,
    lastSeenAt: row.last_seen_at,
    expiresAt: row.expires_at,
    revokedAt: row.revoked_at,
    current: row.id === currentSessionId,
  };
}
