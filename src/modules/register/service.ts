// src/modules/register/service.ts
// ============================================================================
// Registrierung (Orchestrierung)
// ----------------------------------------------------------------------------
// UseCases:
// - startRegistration:    Challenge ausstellen + Code über beide Kanäle
// - resendRegistration:   neuer Code nach Cooldown
// - completeRegistration: Code prüfen → User + Session; Welcome im Hintergrund
//
// Kanal-Fehler brechen nichts ab: sie landen in der Dispatch-Zusammenfassung.
// ============================================================================

import type { FastifyBaseLogger } from "fastify";
import type { AppDeps } from "../../libs/deps.js";
import type { DeviceMeta } from "../../libs/http.js";
import { dispatchNotification, summarizeDispatch } from "../../libs/notify.js";
import { hashEmailForLog } from "../../libs/pii.js";
import { toPublicUser, type UserRow } from "../identity/types.js";
import { issueOtpChallenge, resendOtpChallenge, verifyOtpChallenge } from "../otp/service.js";
import type { IssuedOtp, VerifyOtpInput } from "../otp/types.js";
import { createSession } from "../sessions/service.js";
import type { RegisterInput, RegistrationCompleted, RegistrationStarted } from "./types.js";

async function deliverCode(
  deps: AppDeps,
  issued: IssuedOtp,
  log: FastifyBaseLogger,
): Promise<RegistrationStarted> {
  const { challenge, code } = issued;

  const results = await dispatchNotification(
    deps.channels,
    {
      type: "otp_code",
      email: challenge.email,
      phone: challenge.phone,
      name: challenge.name,
      code,
      expiresInMinutes: Math.ceil(deps.policy.otpTtlSec / 60),
    },
    { timeoutMs: deps.policy.notifyTimeoutMs, log },
  );

  return {
    ok: true,
    expires_at: challenge.expires_at.toISOString(),
    channels: summarizeDispatch(results),
  };
}

export async function startRegistration(
  deps: AppDeps,
  input: RegisterInput,
  log: FastifyBaseLogger,
): Promise<RegistrationStarted> {
  const issued = await issueOtpChallenge(deps.store, input, deps.policy);
  return deliverCode(deps, issued, log);
}

export async function resendRegistration(
  deps: AppDeps,
  input: { email: string; phone: string; ip?: string },
  log: FastifyBaseLogger,
): Promise<RegistrationStarted> {
  const issued = await resendOtpChallenge(deps.store, input, deps.policy);
  return deliverCode(deps, issued, log);
}

/**
 * Welcome-Mail läuft entkoppelt vom Request; Ergebnis nur im Log.
 * Der zurückgegebene Promise wird in Tests abgewartet.
 */
export function sendWelcomeInBackground(
  deps: AppDeps,
  user: UserRow,
  log: FastifyBaseLogger,
): Promise<void> {
  const task = dispatchNotification(
    deps.channels,
    { type: "welcome", email: user.email, name: user.name },
    { timeoutMs: deps.policy.notifyTimeoutMs, log },
  ).then((results) => {
    log.info(
      { email_hash: hashEmailForLog(user.email), channels: summarizeDispatch(results) },
      "welcome_dispatched",
    );
  });

  return task.catch((err: unknown) => {
    log.error({ err }, "welcome_dispatch_failed");
  });
}

export async function completeRegistration(
  deps: AppDeps,
  input: VerifyOtpInput,
  meta: DeviceMeta,
  log: FastifyBaseLogger,
): Promise<RegistrationCompleted> {
  const { user } = await verifyOtpChallenge(deps.store, input);
  const credentials = await createSession(deps.store, user, meta, deps.policy);

  void sendWelcomeInBackground(deps, user, log);

  return { ...credentials, user: toPublicUser(user) };
}
