// src/modules/housekeeping/service.ts
// ============================================================================
// Housekeeping (Maintenance)
// ----------------------------------------------------------------------------
// Abgelaufene OTP-Challenges, Magic-Links, Telefon-Codes und Sessions erst nach
// Ablauf + Retention gelöscht (Audit-Fenster).
// ============================================================================

import type { HousekeepingRepository, PurgeCounts } from "./types.js";

export async function purgeExpiredCredentials(
  store: HousekeepingRepository,
  now: Date,
  retentionSec: number,
): Promise<PurgeCounts & { cutoff: string }> {
  const cutoff = new Date(now.getTime() - retentionSec * 1000);
  const counts = await store.purgeExpiredBefore(cutoff);
  return { ...counts, cutoff: cutoff.toISOString() };
}
