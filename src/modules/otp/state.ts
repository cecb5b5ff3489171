// src/modules/otp/state.ts
// ============================================================================
// Zustandsautomat einer OTP-Challenge
// ----------------------------------------------------------------------------
// Pending → Verified | Expired | Exhausted (alle terminal)
//
// Reihenfolge der Prüfungen:
//   1. verbraucht (verified/superseded) → not_found
//   2. abgelaufen → expired (vor dem Code-Vergleich)
//   3. attempts >= max → exhausted
//   4. Code korrekt → verified
//   5. sonst attempts+1; erreicht das max → exhausted, sonst mismatch
//
// Reine Funktion: schreibt nichts, der Service wendet das Ergebnis per
// Compare-and-update an.
// ============================================================================

import type { OtpChallengeRow } from "./types.js";

export type OtpState = "pending" | "verified" | "expired" | "exhausted" | "superseded";

export type OtpAttemptDecision =
  | { outcome: "not_found" }
  | { outcome: "expired" }
  | { outcome: "exhausted"; nextAttempts?: number }
  | { outcome: "mismatch"; nextAttempts: number; remaining: number }
  | { outcome: "verified" };

// Auch für Telefon-Verifikationen (ohne Supersession) genutzt
export type ChallengeState = Pick<
  OtpChallengeRow,
  "verified_at" | "expires_at" | "attempts" | "max_attempts"
> & { superseded_at?: Date | null };

export function otpState(challenge: ChallengeState, now: Date): OtpState {
  if (challenge.verified_at) return "verified";
  if (challenge.superseded_at) return "superseded";
  if (now.getTime() > challenge.expires_at.getTime()) return "expired";
  if (challenge.attempts >= challenge.max_attempts) return "exhausted";
  return "pending";
}

export function evaluateOtpAttempt(
  challenge: ChallengeState,
  codeMatches: boolean,
  now: Date,
): OtpAttemptDecision {
  switch (otpState(challenge, now)) {
    case "verified":
    case "superseded":
      return { outcome: "not_found" };
    case "expired":
      return { outcome: "expired" };
    case "exhausted":
      return { outcome: "exhausted" };
    case "pending":
      break;
  }

  if (codeMatches) return { outcome: "verified" };

  const nextAttempts = challenge.attempts + 1;
  if (nextAttempts >= challenge.max_attempts) {
    return { outcome: "exhausted", nextAttempts };
  }
  return {
    outcome: "mismatch",
    nextAttempts,
    remaining: challenge.max_attempts - nextAttempts,
  };
}
