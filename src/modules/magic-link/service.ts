// src/modules/magic-link/service.ts
// ============================================================================
// Business-Logik für Magic-Link-Login
// ----------------------------------------------------------------------------
// - requestMagicLink: unbekannte/inaktive E-Mail → stiller No-op
// - sendMagicLinkInBackground: Versand nach der Antwort; Antwortzeit darf
//   nicht von der Adresse abhängen
// - verifyMagicLink: atomar einlösen, danach Fehler klassifizieren
//   (abgelaufen → 410, sonst ungültig → 400)
// ============================================================================

import type { FastifyBaseLogger } from "fastify";
import { generateOpaqueToken, hashOpaqueToken } from "../../libs/crypto.js";
import { ExpiredError, InvalidMagicLinkTokenError } from "../../libs/errors.js";
import { recordMagicLinkVerify } from "../../libs/metrics.js";
import { normalizeEmail } from "../../libs/normalize.js";
import {
  dispatchNotification,
  summarizeDispatch,
  type NotificationChannel,
} from "../../libs/notify.js";
import { hashEmailForLog } from "../../libs/pii.js";
import type { UserRepository, UserRow } from "../identity/types.js";
import type {
  IssuedMagicLink,
  MagicLinkPolicy,
  MagicLinkRepository,
  MagicLinkRequestInput,
} from "./types.js";

type MagicLinkStore = MagicLinkRepository & UserRepository;

export function buildMagicLinkUrl(baseUrl: string, token: string): string {
  const url = new URL("/auth/verify-magic-link", baseUrl);
  url.searchParams.set("token", token);
  return url.toString();
}

export async function issueMagicLink(
  store: MagicLinkRepository,
  user: Pick<UserRow, "id">,
  meta: { ip?: string; userAgent?: string },
  policy: MagicLinkPolicy,
): Promise<IssuedMagicLink> {
  const token = generateOpaqueToken();
  const issuedAt = new Date();

  const link = await store.insertMagicLink({
    userId: user.id,
    tokenHash: hashOpaqueToken(token),
    issuedAt,
    expiresAt: new Date(issuedAt.getTime() + policy.magicLinkTtlSec * 1000),
    ip: meta.ip ?? null,
    userAgent: meta.userAgent ?? null,
    supersedePrevious: policy.magicLinkSupersede,
  });

  return { link, token, url: buildMagicLinkUrl(policy.appBaseUrl, token) };
}

export async function requestMagicLink(
  store: MagicLinkStore,
  input: MagicLinkRequestInput,
  policy: MagicLinkPolicy,
): Promise<{ user: UserRow; issued: IssuedMagicLink } | null> {
  const user = await store.findUserByEmail(normalizeEmail(input.email));

  if (!user || !user.is_active) {
    return null;
  }

  const issued = await issueMagicLink(store, user, input, policy);
  return { user, issued };
}

export function sendMagicLinkInBackground(
  channels: readonly NotificationChannel[],
  requested: { user: UserRow; issued: IssuedMagicLink },
  opts: { ttlSec: number; timeoutMs: number; log: FastifyBaseLogger },
): Promise<void> {
  const { user, issued } = requested;
  const task = dispatchNotification(
    channels,
    {
      type: "magic_link",
      email: user.email,
      name: user.name,
      url: issued.url,
      expiresInMinutes: Math.ceil(opts.ttlSec / 60),
    },
    { timeoutMs: opts.timeoutMs, log: opts.log },
  ).then((results) => {
    opts.log.info(
      { email_hash: hashEmailForLog(user.email), channels: summarizeDispatch(results) },
      "magic_link_dispatched",
    );
  });

  return task.catch((err: unknown) => {
    opts.log.error({ err }, "magic_link_dispatch_failed");
  });
}

export async function verifyMagicLink(
  store: MagicLinkStore,
  rawToken: string,
): Promise<UserRow> {
  const token = rawToken.trim();
  if (!token) {
    recordMagicLinkVerify("invalid");
    throw new InvalidMagicLinkTokenError();
  }

  const tokenHash = hashOpaqueToken(token);
  const now = new Date();
  const consumed = await store.consumeMagicLink(tokenHash, now);

  if (!consumed) {
    const existing = await store.findMagicLinkByHash(tokenHash);
    if (
      existing &&
      !existing.consumed_at &&
      !existing.superseded_at &&
      existing.expires_at.getTime() < now.getTime()
    ) {
      recordMagicLinkVerify("expired");
      throw new ExpiredError("magic_link");
    }
    recordMagicLinkVerify("invalid");
    throw new InvalidMagicLinkTokenError();
  }

  const user = await store.findUserById(consumed.user_id);
  if (!user || !user.is_active) {
    recordMagicLinkVerify("invalid");
    throw new InvalidMagicLinkTokenError();
  }

  recordMagicLinkVerify("verified");
  return user;
}
