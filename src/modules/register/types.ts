// src/modules/register/types.ts
// ============================================================================
// Typen für den Registrierungs-Flow (OTP über E-Mail + SMS)
// ============================================================================

import type { DispatchSummary } from "../../libs/notify.js";
import type { PublicUser } from "../identity/types.js";
import type { SessionCredentials } from "../sessions/types.js";

export interface RegisterInput {
  email: string;
  phone: string;
  name: string;
  locale?: string;
  ip?: string;
}

export interface RegistrationStarted {
  ok: true;
  expires_at: string;
  channels: DispatchSummary;
}

export type RegistrationCompleted = SessionCredentials & {
  user: PublicUser;
};
