// src/modules/magic-link/types.ts
// ============================================================================
// Typen für Magic-Link-Login
// ============================================================================

export interface MagicLinkRow {
  id: string;
  user_id: string;
  token_hash: string;
  issued_at: Date;
  expires_at: Date;
  consumed_at: Date | null;
  superseded_at: Date | null;
  ip: string | null;
  user_agent: string | null;
}

export interface NewMagicLink {
  userId: string;
  tokenHash: string;
  issuedAt: Date;
  expiresAt: Date;
  ip: string | null;
  userAgent: string | null;
  /** true → offene Links des Users werden in derselben Transaktion ersetzt */
  supersedePrevious: boolean;
}

export interface MagicLinkRepository {
  insertMagicLink(input: NewMagicLink): Promise<MagicLinkRow>;
  /** Einziger Übergang Pending → Verified; null wenn nicht (mehr) einlösbar. */
  consumeMagicLink(tokenHash: string, now: Date): Promise<MagicLinkRow | null>;
  findMagicLinkByHash(tokenHash: string): Promise<MagicLinkRow | null>;
}

export type MagicLinkPolicy = {
  magicLinkTtlSec: number;
  magicLinkSupersede: boolean;
  appBaseUrl: string;
};

export interface MagicLinkRequestInput {
  email: string;
  ip?: string;
  userAgent?: string;
}

export interface IssuedMagicLink {
  link: MagicLinkRow;
  token: string;
  url: string;
}
