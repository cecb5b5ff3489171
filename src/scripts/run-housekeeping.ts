// src/scripts/run-housekeeping.ts
// ============================================================================
// Löscht abgelaufene OTP-Challenges, Magic-Links und Sessions
// (Ablauf + CREDENTIAL_RETENTION_SEC). Aufruf: npm run housekeeping
//
// Optional: --retention-sec=<n> überschreibt die Retention aus env.ts
// ============================================================================

import { pool } from "../libs/db.js";
import { env } from "../libs/env.js";
import { createPgStore } from "../libs/store.js";
import { purgeExpiredCredentials } from "../modules/housekeeping/service.js";

function readArg(name: string): string | undefined {
  const prefix = `--${name}=`;
  const arg = process.argv.find((value) => value.startsWith(prefix));
  return arg ? arg.slice(prefix.length) : undefined;
}

async function main() {
  const store = createPgStore(pool);

  const override = readArg("retention-sec");
  const retentionSec = override === undefined ? env.CREDENTIAL_RETENTION_SEC : Number(override);
  if (!Number.isInteger(retentionSec) || retentionSec < 0) {
    throw new Error("--retention-sec must be a non-negative integer.");
  }

  try {
    const result = await purgeExpiredCredentials(store, new Date(), retentionSec);
    console.log("housekeeping", result);
  } finally {
    await store.close();
  }
}

main().catch((err) => {
  console.error("housekeeping_failed", err);
  process.exit(1);
});
