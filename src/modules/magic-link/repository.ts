// src/modules/magic-link/repository.ts
// ============================================================================
// Magic-Link-Repository (auth.magic_links)
// ----------------------------------------------------------------------------
// - Token nur als SHA-256-Hash gespeichert; Lookup über den Hash
// - Einlösen ist ein einziges bedingtes UPDATE (atomar ggü. parallelen Calls)
// ============================================================================

import { withTransaction, type DbPool } from "../../libs/db.js";
import type { MagicLinkRepository, MagicLinkRow, NewMagicLink } from "./types.js";

const LINK_COLUMNS = `
  id,
  user_id,
  token_hash,
  issued_at,
  expires_at,
  consumed_at,
  superseded_at,
  ip,
  user_agent
`;

export function createPgMagicLinkRepository(pool: DbPool): MagicLinkRepository {
  return {
    async insertMagicLink(input: NewMagicLink): Promise<MagicLinkRow> {
      return withTransaction(pool, async (client) => {
        if (input.supersedePrevious) {
          await client.query(
            `
              UPDATE auth.magic_links
              SET superseded_at = $2
              WHERE user_id = $1
                AND consumed_at IS NULL
                AND superseded_at IS NULL;
            `,
            [input.userId, input.issuedAt],
          );
        }

        const { rows } = await client.query<MagicLinkRow>(
          `
            INSERT INTO auth.magic_links (user_id, token_hash, issued_at, expires_at, ip, user_agent)
            VALUES ($1, $2, $3, $4, $5, $6)
            RETURNING ${LINK_COLUMNS};
          `,
          [
            input.userId,
            input.tokenHash,
            input.issuedAt,
            input.expiresAt,
            input.ip,
            input.userAgent,
          ],
        );

        return rows[0];
      });
    },

    async consumeMagicLink(tokenHash: string, now: Date) {
      const { rows } = await pool.query<MagicLinkRow>(
        `
          UPDATE auth.magic_links
          SET consumed_at = $2
          WHERE token_hash = $1
            AND consumed_at IS NULL
            AND superseded_at IS NULL
            AND expires_at >= $2
          RETURNING ${LINK_COLUMNS};
        `,
        [tokenHash, now],
      );
      return rows[0] ?? null;
    },

    async findMagicLinkByHash(tokenHash: string) {
      const { rows } = await pool.query<MagicLinkRow>(
        `
          SELECT ${LINK_COLUMNS}
          FROM auth.magic_links
          WHERE token_hash = $1
          LIMIT 1;
        `,
        [tokenHash],
      );
      return rows[0] ?? null;
    },
  };
}
