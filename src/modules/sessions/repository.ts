// src/modules/sessions/repository.ts
// ============================================================================
// Persistence-Layer für Session-Management (auth.user_sessions)
// ----------------------------------------------------------------------------
// - KEINE Business-Logik, nur Datenzugriff
// - Refresh-Tokens nur als Hash
// ============================================================================

import type { Queryable } from "../../libs/db.js";
import type {
  NewSession,
  RevokeReason,
  RotateRefreshInput,
  SessionRepository,
  SessionRow,
} from "./types.js";

const SESSION_COLUMNS = `
  id,
  user_id,
  refresh_token_hash,
  previous_refresh_token_hash,
  refresh_expires_at,
  expires_at,
  ip,
  user_agent,
  device_type,
  created_at,
  last_seen_at,
  revoked_at,
  revoke_reason
`;

export function createPgSessionRepository(db: Queryable): SessionRepository {
  async function findOne(where: string, value: string): Promise<SessionRow | null> {
    const { rows } = await db.query<SessionRow>(
      `
        SELECT ${SESSION_COLUMNS}
        FROM auth.user_sessions
        WHERE ${where} = $1
        LIMIT 1;
      `,
      [value],
    );
    return rows[0] ?? null;
  }

  return {
    async insertSession(input: NewSession) {
      const { rows } = await db.query<SessionRow>(
        `
          INSERT INTO auth.user_sessions (
            user_id,
            refresh_token_hash,
            refresh_expires_at,
            expires_at,
            ip,
            user_agent,
            device_type,
            created_at,
            last_seen_at
          )
          VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $8)
          RETURNING ${SESSION_COLUMNS};
        `,
        [
          input.userId,
          input.refreshTokenHash,
          input.refreshExpiresAt,
          input.expiresAt,
          input.ip,
          input.userAgent,
          input.deviceType,
          input.createdAt,
        ],
      );
      return rows[0];
    },

    findSessionById: (id) => findOne("id", id),
    findSessionByRefreshHash: (hash) => findOne("refresh_token_hash", hash),
    findSessionByPreviousRefreshHash: (hash) => findOne("previous_refresh_token_hash", hash),

    async rotateRefreshToken(input: RotateRefreshInput) {
      const { rows } = await db.query<SessionRow>(
        `
          UPDATE auth.user_sessions
          SET previous_refresh_token_hash = refresh_token_hash,
              refresh_token_hash = $3,
              refresh_expires_at = $4,
              last_seen_at = $5
          WHERE id = $1
            AND refresh_token_hash = $2
            AND revoked_at IS NULL
          RETURNING ${SESSION_COLUMNS};
        `,
        [input.sessionId, input.expectedHash, input.nextHash, input.refreshExpiresAt, input.now],
      );
      return rows[0] ?? null;
    },

    async revokeSessionRecord(id: string, reason: RevokeReason, now: Date) {
      const res = await db.query(
        `
          UPDATE auth.user_sessions
          SET revoked_at = $3,
              revoke_reason = $2
          WHERE id = $1
            AND revoked_at IS NULL;
        `,
        [id, reason, now],
      );
      return (res.rowCount ?? 0) > 0;
    },

    async listSessionsByUserId(userId: string, limit: number) {
      const { rows } = await db.query<SessionRow>(
        `
          SELECT ${SESSION_COLUMNS}
          FROM auth.user_sessions
          WHERE user_id = $1
          ORDER BY created_at DESC
          LIMIT $2;
        `,
        [userId, limit],
      );
      return rows;
    },
  };
}
