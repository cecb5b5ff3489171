// src/modules/otp/repository.ts
// ============================================================================
// OTP-Repository (auth.otp_challenges)
// ----------------------------------------------------------------------------
// - Supersession unter Advisory-Lock pro (email, phone), in einer Transaktion
// - Jeder Übergang als Compare-and-update auf version
// - completeRegistration: Challenge verifizieren + User anlegen atomar
// ============================================================================

import { withTransaction, type DbPool } from "../../libs/db.js";
import { DuplicateRegistrationError } from "../../libs/errors.js";
import { USER_COLUMNS } from "../identity/repository.js";
import type { UserRow } from "../identity/types.js";
import type {
  CompleteRegistrationInput,
  NewOtpChallenge,
  OtpChallengeRow,
  OtpRepository,
} from "./types.js";

const CHALLENGE_COLUMNS = `
  id,
  email,
  phone,
  name,
  locale,
  code_hash,
  issued_at,
  expires_at,
  verified_at,
  superseded_at,
  attempts,
  max_attempts,
  ip,
  version
`;

export function createPgOtpRepository(pool: DbPool): OtpRepository {
  return {
    async insertOtpChallenge(input: NewOtpChallenge): Promise<OtpChallengeRow> {
      return withTransaction(pool, async (client) => {
        await client.query("SELECT pg_advisory_xact_lock(hashtext($1));", [
          `otp:${input.email}:${input.phone}`,
        ]);

        await client.query(
          `
            UPDATE auth.otp_challenges
            SET superseded_at = $3,
                version = version + 1
            WHERE email = $1
              AND phone = $2
              AND verified_at IS NULL
              AND superseded_at IS NULL;
          `,
          [input.email, input.phone, input.issuedAt],
        );

        const { rows } = await client.query<OtpChallengeRow>(
          `
            INSERT INTO auth.otp_challenges (
              email, phone, name, locale, code_hash,
              issued_at, expires_at, max_attempts, ip
            )
            VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)
            RETURNING ${CHALLENGE_COLUMNS};
          `,
          [
            input.email,
            input.phone,
            input.name,
            input.locale,
            input.codeHash,
            input.issuedAt,
            input.expiresAt,
            input.maxAttempts,
            input.ip,
          ],
        );

        return rows[0];
      });
    },

    async findActiveOtpChallenge(email: string, phone: string) {
      const { rows } = await pool.query<OtpChallengeRow>(
        `
          SELECT ${CHALLENGE_COLUMNS}
          FROM auth.otp_challenges
          WHERE email = $1
            AND phone = $2
            AND verified_at IS NULL
            AND superseded_at IS NULL
          ORDER BY issued_at DESC
          LIMIT 1;
        `,
        [email, phone],
      );
      return rows[0] ?? null;
    },

    async findLatestPendingOtpChallenge(email: string, phone: string) {
      const { rows } = await pool.query<OtpChallengeRow>(
        `
          SELECT ${CHALLENGE_COLUMNS}
          FROM auth.otp_challenges
          WHERE email = $1
            AND phone = $2
            AND verified_at IS NULL
          ORDER BY issued_at DESC
          LIMIT 1;
        `,
        [email, phone],
      );
      return rows[0] ?? null;
    },

    async recordOtpAttempt(id: string, expectedVersion: number, attempts: number) {
      const { rowCount } = await pool.query(
        `
          UPDATE auth.otp_challenges
          SET attempts = $3,
              version = version + 1
          WHERE id = $1
            AND version = $2
            AND verified_at IS NULL
            AND superseded_at IS NULL;
        `,
        [id, expectedVersion, attempts],
      );
      return rowCount === 1;
    },

    async completeRegistration(input: CompleteRegistrationInput): Promise<UserRow | null> {
      return withTransaction(pool, async (client) => {
        const verified = await client.query(
          `
            UPDATE auth.otp_challenges
            SET verified_at = $3,
                version = version + 1
            WHERE id = $1
              AND version = $2
              AND verified_at IS NULL
              AND superseded_at IS NULL;
          `,
          [input.challengeId, input.expectedVersion, input.verifiedAt],
        );

        if (verified.rowCount !== 1) return null;

        const { rows } = await client.query<UserRow>(
          `
            INSERT INTO auth.users (email, phone, name, locale, is_phone_verified)
            VALUES ($1, $2, $3, $4, $5)
            ON CONFLICT DO NOTHING
            RETURNING ${USER_COLUMNS};
          `,
          [
            input.user.email,
            input.user.phone,
            input.user.name,
            input.user.locale,
            input.user.isPhoneVerified,
          ],
        );

        const user = rows[0];
        if (!user) {
          // Rollback der Verifikation via throw
          const { rows: taken } = await client.query<{ email_taken: boolean }>(
            `SELECT EXISTS (SELECT 1 FROM auth.users WHERE email = $1) AS email_taken;`,
            [input.user.email],
          );
          throw new DuplicateRegistrationError(taken[0]?.email_taken ? "email" : "phone");
        }

        return user;
      });
    },
  };
}
