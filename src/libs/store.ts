// src/libs/store.ts
// ============================================================================
// Credential Store
// ----------------------------------------------------------------------------
// Vereinigung aller Modul-Repositories. Produktion: PostgreSQL (createPgStore),
// Tests: MemoryCredentialStore (src/tests/support/memory-store.ts).
// ============================================================================

import { createPgHousekeepingRepository } from "../modules/housekeeping/repository.js";
import type { HousekeepingRepository } from "../modules/housekeeping/types.js";
import { createPgUserRepository } from "../modules/identity/repository.js";
import type { UserRepository } from "../modules/identity/types.js";
import { createPgMagicLinkRepository } from "../modules/magic-link/repository.js";
import type { MagicLinkRepository } from "../modules/magic-link/types.js";
import { createPgPhoneVerificationRepository } from "../modules/phone/repository.js";
import type { PhoneVerificationRepository } from "../modules/phone/types.js";
import { createPgOtpRepository } from "../modules/otp/repository.js";
import type { OtpRepository } from "../modules/otp/types.js";
import { createPgSessionRepository } from "../modules/sessions/repository.js";
import type { SessionRepository } from "../modules/sessions/types.js";
import { createPgTenantRepository } from "../modules/tenants/repository.js";
import type { TenantRepository } from "../modules/tenants/types.js";
import { closeDb, dbHealth, type DbPool } from "./db.js";

export type StoreHealth = { ok: boolean; error?: string };

export type CredentialStore = UserRepository &
  OtpRepository &
  MagicLinkRepository &
  PhoneVerificationRepository &
  SessionRepository &
  TenantRepository &
  HousekeepingRepository & {
    health(): Promise<StoreHealth>;
    close(): Promise<void>;
  };

export function createPgStore(pool: DbPool): CredentialStore {
  return {
    ...createPgUserRepository(pool),
    ...createPgOtpRepository(pool),
    ...createPgMagicLinkRepository(pool),
    ...createPgPhoneVerificationRepository(pool),
    ...createPgSessionRepository(pool),
    ...createPgTenantRepository(pool),
    ...createPgHousekeepingRepository(pool),
    health: () => dbHealth(pool),
    close: () => closeDb(pool),
  };
}
