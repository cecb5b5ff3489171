// src/modules/phone/repository.ts
// ============================================================================
// Repository für Telefon-Verifikationen (auth.phone_verifications)
// ----------------------------------------------------------------------------
// - Upsert pro User (UNIQUE user_id), version zählt jede Änderung
// - Übergänge per Compare-and-update auf version
// - completePhoneVerification: Verifikation + User-Update in einer Transaktion
// ============================================================================

import { isUniqueViolation, withTransaction, type DbPool } from "../../libs/db.js";
import { PhoneTakenError } from "../../libs/errors.js";
import { USER_COLUMNS } from "../identity/repository.js";
import type { UserRow } from "../identity/types.js";
import type {
  CompletePhoneVerificationInput,
  NewPhoneVerification,
  PhoneVerificationRepository,
  PhoneVerificationRow,
} from "./types.js";

const VERIFICATION_COLUMNS = `
  id,
  user_id,
  phone,
  code_hash,
  issued_at,
  expires_at,
  verified_at,
  attempts,
  max_attempts,
  version
`;

export function createPgPhoneVerificationRepository(
  pool: DbPool,
): PhoneVerificationRepository {
  return {
    async findPhoneVerification(userId: string) {
      const { rows } = await pool.query<PhoneVerificationRow>(
        `
          SELECT ${VERIFICATION_COLUMNS}
          FROM auth.phone_verifications
          WHERE user_id = $1;
        `,
        [userId],
      );
      return rows[0] ?? null;
    },

    async upsertPhoneVerification(input: NewPhoneVerification) {
      const { rows } = await pool.query<PhoneVerificationRow>(
        `
          INSERT INTO auth.phone_verifications (
            user_id, phone, code_hash, issued_at, expires_at, max_attempts
          )
          VALUES ($1, $2, $3, $4, $5, $6)
          ON CONFLICT (user_id) DO UPDATE
          SET phone = EXCLUDED.phone,
              code_hash = EXCLUDED.code_hash,
              issued_at = EXCLUDED.issued_at,
              expires_at = EXCLUDED.expires_at,
              max_attempts = EXCLUDED.max_attempts,
              verified_at = NULL,
              attempts = 0,
              version = auth.phone_verifications.version + 1
          RETURNING ${VERIFICATION_COLUMNS};
        `,
        [
          input.userId,
          input.phone,
          input.codeHash,
          input.issuedAt,
          input.expiresAt,
          input.maxAttempts,
        ],
      );
      return rows[0];
    },

    async recordPhoneVerificationAttempt(id: string, expectedVersion: number, attempts: number) {
      const { rowCount } = await pool.query(
        `
          UPDATE auth.phone_verifications
          SET attempts = $3,
              version = version + 1
          WHERE id = $1
            AND version = $2
            AND verified_at IS NULL;
        `,
        [id, expectedVersion, attempts],
      );
      return rowCount === 1;
    },

    async completePhoneVerification(
      input: CompletePhoneVerificationInput,
    ): Promise<UserRow | null> {
      try {
        return await withTransaction(pool, async (client) => {
          const verified = await client.query(
            `
              UPDATE auth.phone_verifications
              SET verified_at = $3,
                  version = version + 1
              WHERE id = $1
                AND version = $2
                AND verified_at IS NULL;
            `,
            [input.verificationId, input.expectedVersion, input.verifiedAt],
          );

          if (verified.rowCount !== 1) return null;

          const { rows } = await client.query<UserRow>(
            `
              UPDATE auth.users
              SET phone = $2,
                  is_phone_verified = true,
                  updated_at = $3
              WHERE id = $1
              RETURNING ${USER_COLUMNS};
            `,
            [input.userId, input.phone, input.verifiedAt],
          );

          return rows[0] ?? null;
        });
      } catch (err) {
        if (isUniqueViolation(err, "users_phone_key")) throw new PhoneTakenError();
        throw err;
      }
    },
  };
}
