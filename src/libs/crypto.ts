// src/libs/crypto.ts
// ============================================================================
// Token-/Code-Erzeugung und -Hashing
// ----------------------------------------------------------------------------
// - Opaque Tokens (Magic-Link, Refresh): 32 Byte Zufall, base64url
// - OTP: 6 Ziffern, gleichverteilt (crypto.randomInt), führende Nullen bleiben
// - Gespeichert werden nur Hashes (SHA-256 bzw. HMAC mit Pepper)
// - Vergleiche laufen konstantzeitig (timingSafeEqual)
// ============================================================================

import { createHash, createHmac, randomBytes, randomInt, timingSafeEqual } from "node:crypto";
import { env } from "./env.js";

export const OTP_CODE_LENGTH = 6;

// ---------------------------------------------------------------------------
// Erzeugung
// ---------------------------------------------------------------------------

export function generateOpaqueToken(bytes = 32): string {
  return randomBytes(bytes).toString("base64url");
}

export function generateOtpCode(): string {
  return String(randomInt(0, 10 ** OTP_CODE_LENGTH)).padStart(OTP_CODE_LENGTH, "0");
}

// ---------------------------------------------------------------------------
// Hashing
// ---------------------------------------------------------------------------

export function hashOpaqueToken(token: string): string {
  return createHash("sha256").update(token, "utf8").digest("hex");
}

export function hashOtpCode(code: string, pepper?: string): string {
  if (pepper && pepper.length > 0) {
    return createHmac("sha256", pepper).update(code, "utf8").digest("hex");
  }
  return hashOpaqueToken(code);
}

/** Aktiver Pepper zuerst; der vorherige bleibt während einer Rotation gültig. */
export function hashOtpCodeCandidates(code: string): string[] {
  const hashes = new Set<string>();
  hashes.add(hashOtpCode(code, env.TOKEN_PEPPER_ACTIVE));
  if (env.TOKEN_PEPPER_PREVIOUS) {
    hashes.add(hashOtpCode(code, env.TOKEN_PEPPER_PREVIOUS));
  }
  return [...hashes];
}

// ---------------------------------------------------------------------------
// Konstantzeit-Vergleich
// ---------------------------------------------------------------------------

export function constantTimeEqualHex(a: string, b: string): boolean {
  const left = Buffer.from(a, "hex");
  const right = Buffer.from(b, "hex");
  if (left.length !== right.length || left.length === 0) {
    // gleiche Arbeit wie im Erfolgsfall
    timingSafeEqual(left, left);
    return false;
  }
  return timingSafeEqual(left, right);
}

/** Prüft alle Kandidaten ohne Early-Exit. */
export function matchesAnyHash(storedHash: string, candidates: string[]): boolean {
  let matched = false;
  for (const candidate of candidates) {
    if (constantTimeEqualHex(storedHash, candidate)) matched = true;
  }
  return matched;
}
