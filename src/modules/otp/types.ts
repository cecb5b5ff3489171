// src/modules/otp/types.ts
// ============================================================================
// Typen für OTP-Challenges (Registrierung per SMS + E-Mail)
// ============================================================================

import type { NewUser, UserRow } from "../identity/types.js";

export interface OtpChallengeRow {
  id: string;
  email: string;
  phone: string;
  name: string;
  locale: string;
  code_hash: string;
  issued_at: Date;
  expires_at: Date;
  verified_at: Date | null;
  superseded_at: Date | null;
  attempts: number;
  max_attempts: number;
  ip: string | null;
  version: number;
}

export interface NewOtpChallenge {
  email: string;
  phone: string;
  name: string;
  locale: string;
  codeHash: string;
  issuedAt: Date;
  expiresAt: Date;
  maxAttempts: number;
  ip: string | null;
}

export interface CompleteRegistrationInput {
  challengeId: string;
  expectedVersion: number;
  verifiedAt: Date;
  user: NewUser;
}

export interface OtpRepository {
  /** Legt eine Challenge an und markiert die bisher aktive des Paars als superseded. */
  insertOtpChallenge(input: NewOtpChallenge): Promise<OtpChallengeRow>;
  findActiveOtpChallenge(email: string, phone: string): Promise<OtpChallengeRow | null>;
  /** Jüngste nicht verifizierte Challenge (auch superseded), Quelle für Resend. */
  findLatestPendingOtpChallenge(email: string, phone: string): Promise<OtpChallengeRow | null>;
  /** Compare-and-update auf version; false = parallel geändert. */
  recordOtpAttempt(id: string, expectedVersion: number, attempts: number): Promise<boolean>;
  /**
   * Markiert die Challenge als verifiziert und legt den User in derselben
   * Transaktion an. null = Versionskonflikt (nichts geschrieben).
   * Wirft DuplicateRegistrationError, wenn E-Mail/Telefon schon vergeben sind.
   */
  completeRegistration(input: CompleteRegistrationInput): Promise<UserRow | null>;
}

export type OtpPolicy = {
  otpTtlSec: number;
  otpMaxAttempts: number;
  otpResendCooldownSec: number;
};

export interface IssueOtpInput {
  email: string;
  phone: string;
  name: string;
  locale?: string;
  ip?: string;
}

export interface IssuedOtp {
  challenge: OtpChallengeRow;
  code: string;
}

export interface VerifyOtpInput {
  email: string;
  phone: string;
  code: string;
}

export interface OtpStatus {
  pending: boolean;
  expires_in_seconds: number;
  attempts_remaining: number;
  resend_available_in_seconds: number;
}
