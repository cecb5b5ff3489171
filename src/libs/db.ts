// src/libs/db.ts
// ============================================================================
// PostgreSQL Connector
// - Ein zentraler Connection-Pool pro Prozess
// - withTransaction() für die atomaren Übergänge des Credential Stores
// - Healthcheck + Graceful Shutdown
// ============================================================================

import pg, { type QueryResult, type QueryResultRow } from "pg";
import { env } from "./env.js";

const { Pool } = pg;

export type DbPool = pg.Pool;
export type DbClient = pg.PoolClient;

// Alles, was query() kann: Pool oder ausgeliehener Client (in Transaktion)
export interface Queryable {
  query<R extends QueryResultRow = QueryResultRow>(
    text: string,
    values?: unknown[],
  ): Promise<QueryResult<R>>;
}

/**
 * Globaler PostgreSQL Connection-Pool.
 * Verbindet erst beim ersten Query (Tests importieren das Modul ohne DB).
 */
export const pool: DbPool = new Pool({
  connectionString: env.DATABASE_URL,
  max: 10,
  idleTimeoutMillis: 10_000,
  connectionTimeoutMillis: 5_000,
});

// ============================================================================
// Transaktionen
// ----------------------------------------------------------------------------
// BEGIN/COMMIT bzw. ROLLBACK bei jedem Fehler; der Client geht immer zurück
// in den Pool. Rückgabewert von fn wird durchgereicht.
// ============================================================================

export async function withTransaction<T>(
  db: DbPool,
  fn: (client: DbClient) => Promise<T>,
): Promise<T> {
  const client = await db.connect();
  let broken: Error | undefined;
  try {
    await client.query("BEGIN");
    const result = await fn(client);
    await client.query("COMMIT");
    return result;
  } catch (err) {
    try {
      await client.query("ROLLBACK");
    } catch (rollbackErr) {
      // Verbindung ist unbrauchbar -> beim release() verwerfen
      broken = rollbackErr instanceof Error ? rollbackErr : new Error("rollback_failed");
    }
    throw err;
  } finally {
    client.release(broken);
  }
}

/** Unique-Verletzung (23505), optional auf einen Constraint eingeschränkt. */
export function isUniqueViolation(err: unknown, constraint?: string): boolean {
  if (!(err instanceof Error) || !("code" in err) || err.code !== "23505") return false;
  if (!constraint) return true;
  return "constraint" in err && err.constraint === constraint;
}

// ============================================================================
// Healthcheck für /health & /health/db
// ============================================================================

export async function dbHealth(db: Queryable = pool): Promise<{ ok: boolean; error?: string }> {
  try {
    await db.query("SELECT 1;");
    return { ok: true };
  } catch (err: unknown) {
    const message =
      err instanceof Error ? err.message : "unknown database error";

    return {
      ok: false,
      error: message,
    };
  }
}

/**
 * Beendet den Pool; wartet, bis alle ausgeliehenen Clients zurück sind.
 */
export async function closeDb(db: DbPool = pool): Promise<void> {
  await db.end();
}
