// src/modules/otp/service.ts
// ============================================================================
// Issuer + Verifier für OTP-Challenges
// ----------------------------------------------------------------------------
// - issueOtpChallenge: Duplikat-Check, Code erzeugen, Challenge speichern
// - resendOtpChallenge: Cooldown, neue Challenge ersetzt die alte
// - verifyOtpChallenge: Zustandsautomat + Compare-and-update mit Retry;
//   bei Erfolg entsteht der User in derselben Transaktion
// ============================================================================

import {
  generateOtpCode,
  hashOtpCode,
  hashOtpCodeCandidates,
  matchesAnyHash,
} from "../../libs/crypto.js";
import { env } from "../../libs/env.js";
import {
  AttemptsExceededError,
  ConcurrencyConflictError,
  DuplicateRegistrationError,
  ExpiredError,
  InvalidCodeError,
  RegistrationNotFoundError,
  ResendCooldownError,
} from "../../libs/errors.js";
import { recordOtpVerify } from "../../libs/metrics.js";
import { normalizeEmail, normalizePhone } from "../../libs/normalize.js";
import type { UserRepository, UserRow } from "../identity/types.js";
import { evaluateOtpAttempt } from "./state.js";
import type {
  IssuedOtp,
  IssueOtpInput,
  OtpChallengeRow,
  OtpPolicy,
  OtpRepository,
  OtpStatus,
  VerifyOtpInput,
} from "./types.js";

type OtpStore = OtpRepository & UserRepository;

const MAX_CAS_RETRIES = 5;
const DEFAULT_LOCALE = "en";

// Vergleichsziel, wenn keine aktive Challenge existiert (gleiches Timing)
export const DUMMY_CODE_HASH = hashOtpCode("000000", "timing-dummy");

export function secondsUntil(target: Date, now: Date): number {
  return Math.max(0, Math.ceil((target.getTime() - now.getTime()) / 1000));
}

// ---------------------------------------------------------------------------
// Issuer
// ---------------------------------------------------------------------------

export async function issueOtpChallenge(
  store: OtpStore,
  input: IssueOtpInput,
  policy: OtpPolicy,
): Promise<IssuedOtp> {
  const email = normalizeEmail(input.email);
  const phone = normalizePhone(input.phone);

  if (await store.findUserByEmail(email)) {
    throw new DuplicateRegistrationError("email");
  }
  if (await store.findUserByPhone(phone)) {
    throw new DuplicateRegistrationError("phone");
  }

  const code = generateOtpCode();
  const issuedAt = new Date();

  const challenge = await store.insertOtpChallenge({
    email,
    phone,
    name: input.name.trim(),
    locale: input.locale ?? DEFAULT_LOCALE,
    codeHash: hashOtpCode(code, env.TOKEN_PEPPER_ACTIVE),
    issuedAt,
    expiresAt: new Date(issuedAt.getTime() + policy.otpTtlSec * 1000),
    maxAttempts: policy.otpMaxAttempts,
    ip: input.ip ?? null,
  });

  return { challenge, code };
}

export async function resendOtpChallenge(
  store: OtpStore,
  input: { email: string; phone: string; ip?: string },
  policy: OtpPolicy,
): Promise<IssuedOtp> {
  const email = normalizeEmail(input.email);
  const phone = normalizePhone(input.phone);

  const latest = await store.findLatestPendingOtpChallenge(email, phone);
  if (!latest) {
    throw new RegistrationNotFoundError();
  }

  const cooldownEndsAt = new Date(
    latest.issued_at.getTime() + policy.otpResendCooldownSec * 1000,
  );
  const retryAfter = secondsUntil(cooldownEndsAt, new Date());
  if (retryAfter > 0) {
    throw new ResendCooldownError(retryAfter);
  }

  return issueOtpChallenge(
    store,
    { email, phone, name: latest.name, locale: latest.locale, ip: input.ip },
    policy,
  );
}

export async function getOtpStatus(
  store: OtpStore,
  input: { email: string; phone: string },
  policy: OtpPolicy,
): Promise<OtpStatus> {
  const email = normalizeEmail(input.email);
  const phone = normalizePhone(input.phone);
  const now = new Date();

  const latest = await store.findLatestPendingOtpChallenge(email, phone);
  if (!latest) {
    return {
      pending: false,
      expires_in_seconds: 0,
      attempts_remaining: 0,
      resend_available_in_seconds: 0,
    };
  }

  const active = latest.superseded_at === null ? latest : null;
  const pending =
    active !== null &&
    now.getTime() <= active.expires_at.getTime() &&
    active.attempts < active.max_attempts;

  return {
    pending,
    expires_in_seconds: pending && active ? secondsUntil(active.expires_at, now) : 0,
    attempts_remaining: pending && active ? active.max_attempts - active.attempts : 0,
    resend_available_in_seconds: secondsUntil(
      new Date(latest.issued_at.getTime() + policy.otpResendCooldownSec * 1000),
      now,
    ),
  };
}

// ---------------------------------------------------------------------------
// Verifier
// ---------------------------------------------------------------------------

export async function verifyOtpChallenge(
  store: OtpStore,
  input: VerifyOtpInput,
): Promise<{ user: UserRow; challenge: OtpChallengeRow }> {
  const email = normalizeEmail(input.email);
  const phone = normalizePhone(input.phone);
  const candidates = hashOtpCodeCandidates(input.code.trim());

  for (let round = 0; round < MAX_CAS_RETRIES; round++) {
    const challenge = await store.findActiveOtpChallenge(email, phone);

    if (!challenge) {
      matchesAnyHash(DUMMY_CODE_HASH, candidates);
      recordOtpVerify("not_found");
      throw new InvalidCodeError();
    }

    const now = new Date();
    const decision = evaluateOtpAttempt(
      challenge,
      matchesAnyHash(challenge.code_hash, candidates),
      now,
    );

    switch (decision.outcome) {
      case "not_found":
        recordOtpVerify("not_found");
        throw new InvalidCodeError();

      case "expired":
        recordOtpVerify("expired");
        throw new ExpiredError("otp");

      case "exhausted":
        if (
          decision.nextAttempts !== undefined &&
          !(await store.recordOtpAttempt(challenge.id, challenge.version, decision.nextAttempts))
        ) {
          continue;
        }
        recordOtpVerify("exhausted");
        throw new AttemptsExceededError();

      case "mismatch":
        if (!(await store.recordOtpAttempt(challenge.id, challenge.version, decision.nextAttempts))) {
          continue;
        }
        recordOtpVerify("mismatch");
        throw new InvalidCodeError(decision.remaining);

      case "verified": {
        const user = await store.completeRegistration({
          challengeId: challenge.id,
          expectedVersion: challenge.version,
          verifiedAt: now,
          user: {
            email: challenge.email,
            phone: challenge.phone,
            name: challenge.name,
            locale: challenge.locale,
            isPhoneVerified: true,
          },
        });
        if (!user) continue;

        recordOtpVerify("verified");
        return { user, challenge: { ...challenge, verified_at: now } };
      }
    }
  }

  recordOtpVerify("conflict");
  throw new ConcurrencyConflictError();
}
