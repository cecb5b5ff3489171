// src/modules/phone/types.ts
// ============================================================================
// Typen für die Telefon-Verifikation bestehender User
// ----------------------------------------------------------------------------
// Ein Datensatz pro User (auth.phone_verifications); eine neue Anforderung
// überschreibt ihn mit frischem Code und zurückgesetzten Versuchen.
// ============================================================================

import type { UserRow } from "../identity/types.js";

export interface PhoneVerificationRow {
  id: string;
  user_id: string;
  phone: string;
  code_hash: string;
  issued_at: Date;
  expires_at: Date;
  verified_at: Date | null;
  attempts: number;
  max_attempts: number;
  version: number;
}

export interface NewPhoneVerification {
  userId: string;
  phone: string;
  codeHash: string;
  issuedAt: Date;
  expiresAt: Date;
  maxAttempts: number;
}

export interface CompletePhoneVerificationInput {
  verificationId: string;
  expectedVersion: number;
  verifiedAt: Date;
  userId: string;
  phone: string;
}

export interface PhoneVerificationRepository {
  findPhoneVerification(userId: string): Promise<PhoneVerificationRow | null>;
  /** Legt den Datensatz des Users an oder ersetzt ihn (attempts = 0, verified_at = null). */
  upsertPhoneVerification(input: NewPhoneVerification): Promise<PhoneVerificationRow>;
  /** Compare-and-update auf version; false = parallel geändert. */
  recordPhoneVerificationAttempt(
    id: string,
    expectedVersion: number,
    attempts: number,
  ): Promise<boolean>;
  /**
   * Markiert verifiziert und setzt phone + is_phone_verified am User,
   * in einer Transaktion. null = Versionskonflikt.
   * Wirft PhoneTakenError, wenn die Nummer inzwischen vergeben ist.
   */
  completePhoneVerification(input: CompletePhoneVerificationInput): Promise<UserRow | null>;
}

export type PhonePolicy = {
  otpTtlSec: number;
  otpMaxAttempts: number;
  phoneVerificationCooldownSec: number;
};

export interface IssuedPhoneVerification {
  verification: PhoneVerificationRow;
  code: string;
}

export interface PhoneVerificationStatus {
  cooldown_active: boolean;
  cooldown_remaining_seconds: number;
  can_send: boolean;
  last_sent_at: string | null;
  has_active_code: boolean;
}
