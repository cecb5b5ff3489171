// src/libs/deps.ts
// ============================================================================
// Abhängigkeiten der App (Store, Cache, Kanäle, Policy)
// ----------------------------------------------------------------------------
// buildApp({ deps }) nimmt sie entgegen; ohne Angabe werden die
// Produktions-Adapter aus env.ts gebaut.
// ============================================================================

import type { FastifyBaseLogger } from "fastify";
import type { MagicLinkPolicy } from "../modules/magic-link/types.js";
import type { OtpPolicy } from "../modules/otp/types.js";
import type { PhonePolicy } from "../modules/phone/types.js";
import type { SessionPolicy } from "../modules/sessions/types.js";
import { pool } from "./db.js";
import { env } from "./env.js";
import { createEmailChannel, createMailTransport, mailHealth } from "./mail.js";
import type { NotificationChannel } from "./notify.js";
import { createRedisCache, type AuthCache } from "./redis.js";
import { createSmsChannel, createTwilioSender } from "./sms.js";
import { createPgStore, type CredentialStore } from "./store.js";

export type AuthPolicy = OtpPolicy &
  MagicLinkPolicy &
  PhonePolicy &
  SessionPolicy & {
    notifyTimeoutMs: number;
    credentialRetentionSec: number;
  };

export type HealthCheck = () => Promise<{ ok: boolean; reason?: string }>;

export interface AppDeps {
  store: CredentialStore;
  cache: AuthCache;
  channels: NotificationChannel[];
  policy: AuthPolicy;
  /** SMTP-Check für /health/smtp; fehlt sie, gilt SMTP als nicht konfiguriert */
  mailHealth?: HealthCheck;
}

export function policyFromEnv(): AuthPolicy {
  return {
    otpTtlSec: env.OTP_TTL_SEC,
    otpMaxAttempts: env.OTP_MAX_ATTEMPTS,
    otpResendCooldownSec: env.OTP_RESEND_COOLDOWN_SEC,
    phoneVerificationCooldownSec: env.PHONE_VERIFICATION_COOLDOWN_SEC,
    magicLinkTtlSec: env.MAGIC_LINK_TTL_SEC,
    magicLinkSupersede: env.MAGIC_LINK_SUPERSEDE,
    appBaseUrl: env.APP_BASE_URL,
    accessTtlSec: env.SESSION_ACCESS_TTL_SEC,
    refreshTtlSec: env.SESSION_REFRESH_TTL_SEC,
    absoluteTtlSec: env.SESSION_ABSOLUTE_TTL_SEC,
    clockSkewSec: env.JWT_CLOCK_SKEW_SEC,
    notifyTimeoutMs: env.NOTIFY_TIMEOUT_MS,
    credentialRetentionSec: env.CREDENTIAL_RETENTION_SEC,
  };
}

export function createDefaultDeps(log: FastifyBaseLogger): AppDeps {
  if (!env.REDIS_URL) {
    throw new Error("Redis-Konfiguration fehlt: setze REDIS_URL oder REDIS_HOST/REDIS_PORT.");
  }

  const transporter = createMailTransport();

  return {
    store: createPgStore(pool),
    cache: createRedisCache({ url: env.REDIS_URL, namespace: env.REDIS_NAMESPACE, log }),
    channels: [createEmailChannel(transporter), createSmsChannel(createTwilioSender())],
    policy: policyFromEnv(),
    mailHealth: () => mailHealth(transporter),
  };
}
