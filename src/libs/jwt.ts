// src/libs/jwt.ts
// ============================================================================
// JWT-Hilfen (JOSE) für Access-Credentials
// ----------------------------------------------------------------------------
// - HS256, Secret via env.ts (secrets-first), active + previous für Rotation
// - JTI pro Token, typ="access"
// - sid bindet das Access-Token an eine UserSession (Revocation/Refresh)
// - Kein Tenant im Token: der Tenant wird pro Request über die Membership
//   aufgelöst (tenant-guard.ts)
// ============================================================================

import crypto from "node:crypto";
import { SignJWT, jwtVerify, type JWTPayload } from "jose";
import { env } from "./env.js";

const activeRawSecret = env.JWT_SECRET_ACTIVE;
const previousRawSecret = env.JWT_SECRET_PREVIOUS;

if (!activeRawSecret) {
  // Kein unsicherer Fallback (auch nicht in dev/test)
  throw new Error("JWT Secret fehlt: setze JWT_SECRET_ACTIVE oder JWT_SECRET_ACTIVE_FILE.");
}

const activeSecret = new TextEncoder().encode(activeRawSecret);
const previousSecret = previousRawSecret
  ? new TextEncoder().encode(previousRawSecret)
  : undefined;

const CLAIM_VERSION = 1;

const UUID_RE =
  /^[0-9a-f]{8}-[0-9a-f]{4}-[1-5][0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/i;

export function isUuid(value: unknown): value is string {
  return typeof value === "string" && UUID_RE.test(value);
}

// ---------------------------------------------------------------------------
// Typdefinition Access-Token Payload
// ---------------------------------------------------------------------------

export interface AccessTokenPayload extends JWTPayload {
  sub: string; // User-ID
  jti: string;
  exp: number; // Unix-Sekunden
  iat: number;
  typ: "access";
  sid: string; // UserSession-ID
  ver: number;
}

// ---------------------------------------------------------------------------
// Access-Token signieren
// ---------------------------------------------------------------------------

export async function signAccessToken(
  sub: string,
  sessionId: string,
  ttlSec: number = env.SESSION_ACCESS_TTL_SEC,
): Promise<{ token: string; jti: string; exp: number }> {
  if (!isUuid(sub)) throw new Error("sub_invalid");
  if (!isUuid(sessionId)) throw new Error("sid_invalid");

  const jti = crypto.randomUUID();
  const now = Math.floor(Date.now() / 1000);
  const exp = now + ttlSec;

  const token = await new SignJWT({
    typ: "access",
    ver: CLAIM_VERSION,
    sid: sessionId,
  })
    .setProtectedHeader({
      alg: "HS256",
      ...(env.JWT_ACTIVE_KID ? { kid: env.JWT_ACTIVE_KID } : {}),
    })
    .setSubject(sub)
    .setJti(jti)
    .setIssuedAt(now)
    .setExpirationTime(exp)
    .setIssuer(env.JWT_ISSUER)
    .setAudience(env.JWT_AUDIENCE)
    .sign(activeSecret);

  return { token, jti, exp };
}

// ---------------------------------------------------------------------------
// Access-Token verifizieren + Claims erzwingen
// ---------------------------------------------------------------------------

export async function verifyAccessToken(token: string): Promise<AccessTokenPayload> {
  const verifyOptions = {
    issuer: env.JWT_ISSUER,
    audience: env.JWT_AUDIENCE,
    clockTolerance: env.JWT_CLOCK_SKEW_SEC,
  } as const;

  let payload: JWTPayload;
  try {
    const verified = await jwtVerify(token, activeSecret, verifyOptions);
    payload = verified.payload;
  } catch (activeError) {
    if (!previousSecret) {
      throw activeError;
    }
    const verified = await jwtVerify(token, previousSecret, verifyOptions);
    payload = verified.payload;
  }

  const { typ, sub, jti, exp, iat, sid, ver } = payload;

  if (typ !== "access") throw new Error("invalid_token_type");
  if (!isUuid(sub)) throw new Error("sub_missing");
  if (typeof jti !== "string" || jti.length === 0) throw new Error("jti_missing");
  if (typeof exp !== "number") throw new Error("exp_missing");
  if (typeof iat !== "number") throw new Error("iat_missing");
  if (!isUuid(sid)) throw new Error("sid_missing");

  let claimVersion = CLAIM_VERSION;
  if (ver !== undefined) {
    if (typeof ver !== "number" || ver < 1) throw new Error("ver_invalid");
    claimVersion = ver;
  }

  return { ...payload, typ, sub, jti, exp, iat, sid, ver: claimVersion };
}
