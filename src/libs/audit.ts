// src/libs/audit.ts
// ============================================================================
// Audit-Events (Redis Stream "auth-events")
// - best-effort: Fehler beim Stream brechen den Request NICHT ab
// - nur gehashte PII in den Feldern
// ============================================================================

import type { FastifyInstance } from "fastify";

export const AUTH_EVENTS_STREAM = "auth-events";

export async function auditEvent(
  app: FastifyInstance,
  fields: { type: string } & Record<string, string | number>,
): Promise<void> {
  try {
    await app.deps.cache.streamAdd(AUTH_EVENTS_STREAM, fields);
  } catch (err) {
    app.log.warn({ err, type: fields.type }, "auth_event_stream_failed");
  }
}
