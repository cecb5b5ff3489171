// src/modules/identity/types.ts
// ============================================================================
// Typen für User / Profil
// ============================================================================

export interface UserRow {
  id: string;
  email: string;
  phone: string | null;
  name: string;
  locale: string;
  is_active: boolean;
  is_phone_verified: boolean;
  created_at: Date;
  updated_at: Date;
  last_login_at: Date | null;
}

export interface NewUser {
  email: string;
  phone: string;
  name: string;
  locale: string;
  isPhoneVerified: boolean;
}

export interface ProfilePatch {
  name?: string;
  locale?: string;
}

export interface UserRepository {
  findUserById(id: string): Promise<UserRow | null>;
  findUserByEmail(email: string): Promise<UserRow | null>;
  findUserByPhone(phone: string): Promise<UserRow | null>;
  updateUserProfile(id: string, patch: ProfilePatch): Promise<UserRow | null>;
  touchLastLogin(id: string, at: Date): Promise<void>;
}

export type PublicUser = {
  id: string;
  email: string;
  phone: string | null;
  name: string;
  locale: string;
  is_phone_verified: boolean;
  created_at: string;
};

export function toPublicUser(row: UserRow): PublicUser {
  return {
    id: row.id,
    email: row.email,
    phone: row.phone,
    name: row.name,
    locale: row.locale,
    is_phone_verified: row.is_phone_verified,
    created_at: row.created_at.toISOString(),
  };
}
