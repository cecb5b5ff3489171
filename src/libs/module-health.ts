// src/libs/module-health.ts
// ============================================================================
// Modul-Healthcheck für GET /auth/<module>/health
// ============================================================================

import type { FastifyInstance, FastifyReply } from "fastify";

export async function sendModuleHealth(
  app: FastifyInstance,
  reply: FastifyReply,
  module: string,
) {
  let db: { ok: boolean; error: string | null };
  try {
    const { ok, error } = await app.deps.store.health();
    db = { ok, error: error ?? null };
  } catch (err: unknown) {
    db = { ok: false, error: err instanceof Error ? err.message : "Unknown DB error" };
  }

  return reply.code(db.ok ? 200 : 503).send({
    module,
    healthy: db.ok,
    db,
  });
}
