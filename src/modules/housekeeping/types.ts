// src/modules/housekeeping/types.ts
// ============================================================================
// Typen für das Aufräumen abgelaufener Credentials
// ============================================================================

export interface PurgeCounts {
  otp_challenges: number;
  magic_links: number;
  phone_verifications: number;
  sessions: number;
}

export interface HousekeepingRepository {
  /** Löscht Datensätze, deren Ablauf vor `cutoff` liegt. */
  purgeExpiredBefore(cutoff: Date): Promise<PurgeCounts>;
}
