// src/tests/support/test-app.ts
// ============================================================================
// Test-App mit In-Memory-Abhängigkeiten
// ============================================================================

import type { FastifyInstance } from "fastify";
import { buildApp } from "../../app.js";
import type { AppDeps, AuthPolicy } from "../../libs/deps.js";
import type { UserRow } from "../../modules/identity/types.js";
import { createSession } from "../../modules/sessions/service.js";
import type { SessionCredentials } from "../../modules/sessions/types.js";
import { MemoryCache } from "./memory-cache.js";
import { MemoryCredentialStore } from "./memory-store.js";
import { RecordingChannel } from "./recording-channel.js";

export const TEST_POLICY: AuthPolicy = {
  otpTtlSec: 600,
  otpMaxAttempts: 3,
  otpResendCooldownSec: 60,
  phoneVerificationCooldownSec: 600,
  magicLinkTtlSec: 900,
  magicLinkSupersede: false,
  appBaseUrl: "http://localhost:3000",
  accessTtlSec: 900,
  refreshTtlSec: 86_400,
  absoluteTtlSec: 30 * 86_400,
  clockSkewSec: 60,
  notifyTimeoutMs: 200,
  credentialRetentionSec: 0,
};

export type TestContext = {
  app: FastifyInstance;
  deps: AppDeps;
  store: MemoryCredentialStore;
  cache: MemoryCache;
  email: RecordingChannel;
  sms: RecordingChannel;
};

export function createTestDeps(policy: Partial<AuthPolicy> = {}) {
  const store = new MemoryCredentialStore();
  const cache = new MemoryCache();
  const email = new RecordingChannel("email");
  const sms = new RecordingChannel("sms", ["otp_code", "phone_code"]);
  const deps: AppDeps = {
    store,
    cache,
    channels: [email, sms],
    policy: { ...TEST_POLICY, ...policy },
    mailHealth: async () => ({ ok: true }),
  };
  return { deps, store, cache, email, sms };
}

export async function buildTestApp(policy: Partial<AuthPolicy> = {}): Promise<TestContext> {
  const parts = createTestDeps(policy);
  const app = await buildApp({ deps: parts.deps, logger: false, enableCors: false });
  await app.ready();
  return { app, ...parts };
}

/** Session für einen geseedeten User, ohne den Registrierungs-Flow */
export function loginAs(ctx: Pick<TestContext, "deps">, user: UserRow): Promise<SessionCredentials> {
  return createSession(ctx.deps.store, user, { ip: "127.0.0.1" }, ctx.deps.policy);
}

export function bearer(credentials: SessionCredentials): Record<string, string> {
  return { authorization: `Bearer ${credentials.access_token}` };
}
