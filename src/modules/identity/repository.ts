// src/modules/identity/repository.ts
// ============================================================================
// Identity-Repository (auth.users)
// ----------------------------------------------------------------------------
// - Nur Datenzugriff, keine Business-Logik
// - User werden ausschließlich in otp/repository.ts (completeRegistration)
//   angelegt, zusammen mit der Verifikation der Challenge
// ============================================================================

import type { Queryable } from "../../libs/db.js";
import type { ProfilePatch, UserRepository, UserRow } from "./types.js";

export const USER_COLUMNS = `
  id,
  email,
  phone,
  name,
  locale,
  is_active,
  is_phone_verified,
  created_at,
  updated_at,
  last_login_at
`;

export function createPgUserRepository(db: Queryable): UserRepository {
  return {
    async findUserById(id: string): Promise<UserRow | null> {
      const { rows } = await db.query<UserRow>(
        `
          SELECT ${USER_COLUMNS}
          FROM auth.users
          WHERE id = $1
          LIMIT 1;
        `,
        [id],
      );
      return rows[0] ?? null;
    },

    async findUserByEmail(email: string): Promise<UserRow | null> {
      const { rows } = await db.query<UserRow>(
        `
          SELECT ${USER_COLUMNS}
          FROM auth.users
          WHERE email = $1
          LIMIT 1;
        `,
        [email.toLowerCase()],
      );
      return rows[0] ?? null;
    },

    async findUserByPhone(phone: string): Promise<UserRow | null> {
      const { rows } = await db.query<UserRow>(
        `
          SELECT ${USER_COLUMNS}
          FROM auth.users
          WHERE phone = $1
          LIMIT 1;
        `,
        [phone],
      );
      return rows[0] ?? null;
    },

    async updateUserProfile(id: string, patch: ProfilePatch): Promise<UserRow | null> {
      const { rows } = await db.query<UserRow>(
        `
          UPDATE auth.users
          SET
            name = COALESCE($2, name),
            locale = COALESCE($3, locale),
            updated_at = now()
          WHERE id = $1
          RETURNING ${USER_COLUMNS};
        `,
        [id, patch.name ?? null, patch.locale ?? null],
      );
      return rows[0] ?? null;
    },

    async touchLastLogin(id: string, at: Date): Promise<void> {
      await db.query(
        `UPDATE auth.users SET last_login_at = $2 WHERE id = $1;`,
        [id, at],
      );
    },
  };
}
