// src/scripts/migrate.ts
// ============================================================================
// Wendet db/schema.sql an (idempotent: CREATE ... IF NOT EXISTS)
// Aufruf: npm run migrate
// ============================================================================

import { readFile } from "node:fs/promises";
import { closeDb, pool, withTransaction } from "../libs/db.js";

// src/scripts → ../../db (gilt auch für dist/scripts)
const SCHEMA_URL = new URL("../../db/schema.sql", import.meta.url);

async function main() {
  const sql = await readFile(SCHEMA_URL, "utf8");

  await withTransaction(pool, async (client) => {
    await client.query(sql);
  });

  console.info("migrate_applied", { schema: SCHEMA_URL.pathname });
}

main()
  .catch((err: unknown) => {
    console.error("migrate_failed", err);
    process.exitCode = 1;
  })
  .finally(() => closeDb());
