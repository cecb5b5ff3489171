// src/modules/housekeeping/repository.ts
// ============================================================================
// Cleanup auf auth.otp_challenges, auth.magic_links,
// auth.phone_verifications, auth.user_sessions
// ============================================================================

import { withTransaction, type DbPool } from "../../libs/db.js";
import type { HousekeepingRepository } from "./types.js";

export function createPgHousekeepingRepository(pool: DbPool): HousekeepingRepository {
  return {
    async purgeExpiredBefore(cutoff: Date) {
      return withTransaction(pool, async (client) => {
        const otp = await client.query(
          `DELETE FROM auth.otp_challenges WHERE expires_at < $1;`,
          [cutoff],
        );
        const links = await client.query(
          `DELETE FROM auth.magic_links WHERE expires_at < $1;`,
          [cutoff],
        );
        const phone = await client.query(
          `DELETE FROM auth.phone_verifications WHERE expires_at < $1;`,
          [cutoff],
        );
        const sessions = await client.query(
          `
            DELETE FROM auth.user_sessions
            WHERE expires_at < $1
               OR (revoked_at IS NOT NULL AND revoked_at < $1);
          `,
          [cutoff],
        );

        return {
          otp_challenges: otp.rowCount ?? 0,
          magic_links: links.rowCount ?? 0,
          phone_verifications: phone.rowCount ?? 0,
          sessions: sessions.rowCount ?? 0,
        };
      });
    },
  };
}
