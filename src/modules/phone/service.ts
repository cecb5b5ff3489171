// src/modules/phone/service.ts
// ============================================================================
// Telefon-Verifikation für angemeldete User
// ----------------------------------------------------------------------------
// - requestPhoneVerification: Nummer prüfen, Cooldown, Code per SMS
// - confirmPhoneVerification: gleicher Zustandsautomat wie die Registrierung,
//   bei Erfolg phone + is_phone_verified am User
// - getPhoneVerificationStatus: Cooldown / aktiver Code, ohne den Code
// ============================================================================

import type { FastifyBaseLogger } from "fastify";
import {
  generateOtpCode,
  hashOtpCode,
  hashOtpCodeCandidates,
  matchesAnyHash,
} from "../../libs/crypto.js";
import type { AppDeps } from "../../libs/deps.js";
import { env } from "../../libs/env.js";
import {
  AttemptsExceededError,
  AuthenticationError,
  ConcurrencyConflictError,
  ExpiredError,
  InvalidCodeError,
  PhoneTakenError,
  ResendCooldownError,
} from "../../libs/errors.js";
import { recordPhoneVerify } from "../../libs/metrics.js";
import { normalizePhone } from "../../libs/normalize.js";
import { dispatchNotification, summarizeDispatch, type DispatchSummary } from "../../libs/notify.js";
import type { UserRepository, UserRow } from "../identity/types.js";
import { DUMMY_CODE_HASH, secondsUntil } from "../otp/service.js";
import { evaluateOtpAttempt, otpState } from "../otp/state.js";
import type {
  IssuedPhoneVerification,
  PhonePolicy,
  PhoneVerificationRepository,
  PhoneVerificationRow,
  PhoneVerificationStatus,
} from "./types.js";

type PhoneStore = PhoneVerificationRepository & UserRepository;

const MAX_CAS_RETRIES = 5;

function cooldownEndsAt(row: PhoneVerificationRow, policy: PhonePolicy): Date {
  return new Date(row.issued_at.getTime() + policy.phoneVerificationCooldownSec * 1000);
}

// ---------------------------------------------------------------------------
// Issuer
// ---------------------------------------------------------------------------

export async function issuePhoneVerification(
  store: PhoneStore,
  input: { userId: string; phone: string },
  policy: PhonePolicy,
): Promise<{ user: UserRow; issued: IssuedPhoneVerification }> {
  const phone = normalizePhone(input.phone);

  const user = await store.findUserById(input.userId);
  if (!user || !user.is_active) {
    throw new AuthenticationError("user_inactive");
  }

  const owner = await store.findUserByPhone(phone);
  if (owner && owner.id !== user.id) {
    throw new PhoneTakenError();
  }

  const now = new Date();
  const existing = await store.findPhoneVerification(user.id);
  if (existing) {
    const retryAfter = secondsUntil(cooldownEndsAt(existing, policy), now);
    if (retryAfter > 0) throw new ResendCooldownError(retryAfter);
  }

  const code = generateOtpCode();
  const verification = await store.upsertPhoneVerification({
    userId: user.id,
    phone,
    codeHash: hashOtpCode(code, env.TOKEN_PEPPER_ACTIVE),
    issuedAt: now,
    expiresAt: new Date(now.getTime() + policy.otpTtlSec * 1000),
    maxAttempts: policy.otpMaxAttempts,
  });

  return { user, issued: { verification, code } };
}

export async function requestPhoneVerification(
  deps: AppDeps,
  input: { userId: string; phone: string },
  log: FastifyBaseLogger,
): Promise<{ ok: true; phone: string; expires_at: string; channels: DispatchSummary }> {
  const { user, issued } = await issuePhoneVerification(deps.store, input, deps.policy);
  const { verification, code } = issued;

  const results = await dispatchNotification(
    deps.channels,
    {
      type: "phone_code",
      phone: verification.phone,
      name: user.name,
      code,
      expiresInMinutes: Math.ceil(deps.policy.otpTtlSec / 60),
    },
    { timeoutMs: deps.policy.notifyTimeoutMs, log },
  );

  return {
    ok: true,
    phone: verification.phone,
    expires_at: verification.expires_at.toISOString(),
    channels: summarizeDispatch(results),
  };
}

// ---------------------------------------------------------------------------
// Verifier
// ---------------------------------------------------------------------------

export async function confirmPhoneVerification(
  store: PhoneStore,
  input: { userId: string; code: string },
): Promise<UserRow> {
  const candidates = hashOtpCodeCandidates(input.code.trim());

  for (let round = 0; round < MAX_CAS_RETRIES; round++) {
    const row = await store.findPhoneVerification(input.userId);

    if (!row) {
      matchesAnyHash(DUMMY_CODE_HASH, candidates);
      recordPhoneVerify("not_found");
      throw new InvalidCodeError();
    }

    const now = new Date();
    const decision = evaluateOtpAttempt(row, matchesAnyHash(row.code_hash, candidates), now);

    switch (decision.outcome) {
      case "not_found":
        recordPhoneVerify("not_found");
        throw new InvalidCodeError();

      case "expired":
        recordPhoneVerify("expired");
        throw new ExpiredError("otp");

      case "exhausted":
        if (
          decision.nextAttempts !== undefined &&
          !(await store.recordPhoneVerificationAttempt(row.id, row.version, decision.nextAttempts))
        ) {
          continue;
        }
        recordPhoneVerify("exhausted");
        throw new AttemptsExceededError();

      case "mismatch":
        if (!(await store.recordPhoneVerificationAttempt(row.id, row.version, decision.nextAttempts))) {
          continue;
        }
        recordPhoneVerify("mismatch");
        throw new InvalidCodeError(decision.remaining);

      case "verified": {
        const user = await store.completePhoneVerification({
          verificationId: row.id,
          expectedVersion: row.version,
          verifiedAt: now,
          userId: row.user_id,
          phone: row.phone,
        });
        if (!user) continue;

        recordPhoneVerify("verified");
        return user;
      }
    }
  }

  recordPhoneVerify("conflict");
  throw new ConcurrencyConflictError();
}

// ---------------------------------------------------------------------------
// Status
// ---------------------------------------------------------------------------

export async function getPhoneVerificationStatus(
  store: PhoneVerificationRepository,
  userId: string,
  policy: PhonePolicy,
): Promise<PhoneVerificationStatus> {
  const row = await store.findPhoneVerification(userId);
  if (!row) {
    return {
      cooldown_active: false,
      cooldown_remaining_seconds: 0,
      can_send: true,
      last_sent_at: null,
      has_active_code: false,
    };
  }

  const now = new Date();
  const remaining = secondsUntil(cooldownEndsAt(row, policy), now);

  return {
    cooldown_active: remaining > 0,
    cooldown_remaining_seconds: remaining,
    can_send: remaining === 0,
    last_sent_at: row.issued_at.toISOString(),
    has_active_code: otpState(row, now) === "pending",
  };
}
