// src/libs/error-map.ts
// ============================================================================
// pg-/Infrastruktur-Fehler → API-Fehler
// ----------------------------------------------------------------------------
// - Constraint-Verletzungen: 400
// - Verbindungsprobleme (Store nicht erreichbar): 503, ohne Retry
// ============================================================================

export type MappedDbError = {
  status: number;
  code: string;
  message: string;
};

const UNAVAILABLE_CODES = new Set([
  "ECONNREFUSED",
  "ECONNRESET",
  "ETIMEDOUT",
  "ENOTFOUND",
  "57P01",
  "57P03",
  "53300",
]);

function readCode(err: unknown): string | undefined {
  if (typeof err !== "object" || err === null || !("code" in err)) return undefined;
  const { code } = err;
  return typeof code === "string" ? code : undefined;
}

export function isStoreUnavailable(err: unknown): boolean {
  const code = readCode(err);
  if (!code) return false;
  return UNAVAILABLE_CODES.has(code) || code.startsWith("08");
}

export function mapDbError(err: unknown): MappedDbError {
  const code = readCode(err);

  if (isStoreUnavailable(err)) {
    return {
      status: 503,
      code: "SERVICE_UNAVAILABLE",
      message: "Service temporarily unavailable.",
    };
  }

  switch (code) {
    case "23505":
      return {
        status: 400,
        code: "REGISTER_NOT_POSSIBLE",
        message: "Operation konnte nicht ausgefuehrt werden.",
      };
    case "23503":
    case "23514":
    case "23502":
    case "22P02":
      return {
        status: 400,
        code: "VALIDATION_FAILED",
        message: "Ungueltige Eingabedaten.",
      };
    default:
      return {
        status: 500,
        code: "INTERNAL",
        message: "Internal server error.",
      };
  }
}
