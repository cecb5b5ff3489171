// src/libs/pii.ts
// ============================================================================
// PII nur gehasht in Logs / Audit-Events
// ============================================================================

import { createHash } from "node:crypto";

export function sha256(value: string): string {
  return createHash("sha256").update(value, "utf8").digest("hex");
}

export function hashEmailForLog(email: string): string {
  return sha256(email.trim().toLowerCase());
}

export function hashPhoneForLog(phone: string): string {
  return sha256(phone.replace(/[^\d+]/g, ""));
}

export function hashIpForLog(ip: string): string {
  return sha256(ip.trim());
}
